import { canHighlightName, kindForCandidateDecls, kindForDecl, kindForType } from './classifier';
import { CollectedHighlightings, HighlightingDiagnostic, HighlightingToken } from './entities';
import { HighlightingKind } from './HighlightingKind';
import { Decl, ResolvedTree, SourceLocation, TreeNode } from './tree';

function assertNever(node: never): never {
  throw new Error(`Unhandled tree node: ${JSON.stringify(node)}`);
}

/**
 * Walks a resolved tree once and emits a raw token for every nameable
 * occurrence in the main file. The output is unsorted and may contain
 * duplicates and same-range conflicts; see collectTokens.
 */
export class TreeWalker {
  private tokens: HighlightingToken[] = [];
  private diagnostics: HighlightingDiagnostic[] = [];

  constructor(private readonly tree: ResolvedTree) {}

  walk(): CollectedHighlightings {
    this.tokens = [];
    this.diagnostics = [];

    // Explicit stack instead of recursion, resolved trees can be very deep.
    const stack: TreeNode[] = [...this.tree.nodes].reverse();
    let node = stack.pop();
    while (node) {
      this.visit(node);
      if (node.children) {
        for (let i = node.children.length - 1; i >= 0; i--) {
          stack.push(node.children[i]);
        }
      }
      node = stack.pop();
    }

    return { tokens: this.tokens, diagnostics: this.diagnostics };
  }

  private visit(node: TreeNode): void {
    switch (node.shape) {
      case 'declaration':
        this.visitDeclaration(node.decl);
        if (node.placeholder?.deduced) {
          // Highlight 'auto' with its underlying type.
          this.addKind(node.placeholder.location, kindForType(node.placeholder.deduced));
        }
        return;
      case 'declRef':
      case 'memberAccess':
        if (canHighlightName(node.name)) {
          this.addDecl(node.location, node.decl);
        }
        return;
      case 'overloadRef':
        if (canHighlightName(node.name)) {
          this.addKind(
            node.location,
            kindForCandidateDecls(node.candidates) ?? HighlightingKind.DependentName,
          );
        }
        return;
      case 'dependentDeclRef':
      case 'dependentMemberAccess':
        if (canHighlightName(node.name)) {
          this.addKind(node.location, HighlightingKind.DependentName);
        }
        return;
      case 'typedefTypeRef':
        this.addDecl(node.location, node.decl);
        return;
      case 'templateSpecializationRef':
        if (node.template) {
          this.addDecl(node.location, node.template);
        }
        return;
      case 'tagTypeRef':
        // The defining occurrence is emitted by its declaration node.
        if (!node.isDefinition) {
          this.addKind(node.location, kindForType(node.type));
        }
        return;
      case 'decltypeRef':
        this.addKind(node.location, kindForType(node.type));
        return;
      case 'dependentTypeRef':
        this.addKind(node.location, HighlightingKind.DependentType);
        return;
      case 'templateParameterTypeRef':
        this.addKind(node.location, HighlightingKind.TemplateParameter);
        return;
      case 'namespaceQualifier':
        if (node.specifier === 'namespace' || node.specifier === 'namespaceAlias') {
          this.addKind(node.location, HighlightingKind.Namespace);
        }
        return;
      case 'memberInitializer':
        if (node.member) {
          this.addDecl(node.location, node.member);
        }
        return;
      default:
        assertNever(node);
    }
  }

  private visitDeclaration(decl: Decl): void {
    if (canHighlightName(decl.name)) {
      this.addDecl(decl.location, decl);
    }
    if (decl.kind === 'NamespaceAlias' && decl.aliased) {
      // The alias target is not reachable through any other node.
      this.addDecl(decl.targetNameLocation, decl.aliased);
    }
    if (decl.kind === 'Using') {
      this.addKind(decl.location, kindForCandidateDecls(decl.shadows));
    }
  }

  private addDecl(location: SourceLocation | undefined, decl: Decl): void {
    this.addKind(location, kindForDecl(decl));
  }

  private addKind(location: SourceLocation | undefined, kind: HighlightingKind | undefined): void {
    if (!location || kind === undefined) {
      return;
    }

    // Only macro arguments (DEF_X(arg)) are highlighted token by token.
    if (location.kind === 'macro' && !location.argument) {
      return;
    }
    const fileLocation = location.kind === 'macro' ? location.spelling : location;

    const sourceManager = this.tree.sourceManager;
    if (!sourceManager.isInsideMainFile(fileLocation)) {
      return;
    }

    const range = sourceManager.getTokenRange(fileLocation);
    if (!range) {
      this.diagnostics.push({
        message: 'Tried to add semantic token with an invalid range',
        location: fileLocation,
      });
      return;
    }

    this.tokens.push({ kind, range });
  }
}
