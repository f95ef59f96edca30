import { HighlightingKind } from './HighlightingKind';
import { Decl, DeclName, Type, VariableStorage } from './tree';

// Wrapper and sugar chains are a handful of links deep in well-formed trees.
const MAX_UNWRAP_DEPTH = 16;

/**
 * Some names are not written in the source code and cannot be highlighted,
 * e.g. anonymous classes.
 */
export function canHighlightName(name: DeclName): boolean {
  if (name.kind === 'constructor' || name.kind === 'usingDirective') {
    return true;
  }
  return name.kind === 'identifier' && name.text !== '';
}

function unwrapDecl(decl: Decl): Decl | undefined {
  let current = decl;
  for (let depth = 0; depth < MAX_UNWRAP_DEPTH; depth++) {
    if (current.kind === 'UsingShadow' && current.target) {
      current = current.target;
    } else if (current.kind === 'Template' && current.templated) {
      current = current.templated;
    } else {
      return current;
    }
  }
  return undefined;
}

function canonicalType(type: Type): Type | undefined {
  let current = type;
  for (let depth = 0; depth < MAX_UNWRAP_DEPTH; depth++) {
    if (current.kind !== 'Sugared') {
      return current;
    }
    if (!current.underlying) {
      return undefined;
    }
    current = current.underlying;
  }
  return undefined;
}

function kindForStorage(storage: VariableStorage): HighlightingKind {
  switch (storage) {
    case 'staticMember':
      return HighlightingKind.StaticField;
    case 'local':
      return HighlightingKind.LocalVariable;
    case 'global':
      return HighlightingKind.Variable;
  }
}

export function kindForDecl(decl: Decl): HighlightingKind | undefined {
  const target = unwrapDecl(decl);
  if (!target) {
    return undefined;
  }

  switch (target.kind) {
    case 'Typedef': {
      // Highlight typedefs as their underlying type, with a generic fallback.
      const underlying = target.underlying ? kindForType(target.underlying) : undefined;
      return underlying ?? HighlightingKind.Typedef;
    }
    case 'Record':
      // Lambdas are records too, but have no name to highlight.
      return target.isLambda ? undefined : HighlightingKind.Class;
    case 'Constructor':
      return HighlightingKind.Class;
    case 'Method':
      return target.isStatic ? HighlightingKind.StaticMethod : HighlightingKind.Method;
    case 'Field':
      return HighlightingKind.Field;
    case 'Enum':
      return HighlightingKind.Enum;
    case 'EnumConstant':
      return HighlightingKind.EnumConstant;
    case 'Parameter':
      return HighlightingKind.Parameter;
    case 'Variable':
      return kindForStorage(target.storage);
    case 'Binding':
      return HighlightingKind.Variable;
    case 'Function':
      return HighlightingKind.Function;
    case 'Namespace':
    case 'NamespaceAlias':
    case 'UsingDirective':
      return HighlightingKind.Namespace;
    case 'TemplateTypeParameter':
    case 'NonTypeTemplateParameter':
    case 'TemplateTemplateParameter':
      return HighlightingKind.TemplateParameter;
    case 'UsingShadow':
    case 'Template':
    case 'Using':
    case 'Other':
      return undefined;
  }
}

export function kindForType(type: Type): HighlightingKind | undefined {
  const canonical = canonicalType(type);
  // Builtins are special, they do not have decls.
  if (canonical?.kind === 'Builtin') {
    return HighlightingKind.Primitive;
  }
  if (type.kind === 'TemplateTypeParm') {
    return type.decl ? kindForDecl(type.decl) : undefined;
  }
  if (canonical?.kind === 'Tag') {
    return kindForDecl(canonical.decl);
  }
  return undefined;
}

/**
 * Returns the kind shared by every candidate, or undefined when any candidate
 * is unclassifiable, the candidates disagree, or there are none.
 */
export function kindForCandidateDecls(decls: Iterable<Decl>): HighlightingKind | undefined {
  let result: HighlightingKind | undefined;
  for (const decl of decls) {
    const kind = kindForDecl(decl);
    if (kind === undefined || (result !== undefined && kind !== result)) {
      return undefined;
    }
    result = kind;
  }
  return result;
}
