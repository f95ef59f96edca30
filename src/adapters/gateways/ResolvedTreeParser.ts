import { InvalidTreeError } from '../../domain/errors';
import { SourceRange } from '../../domain/SourceRange';
import {
  Decl,
  DeclKind,
  DeclName,
  FileLocation,
  NameKind,
  NestedNameSpecifierKind,
  ResolvedTree,
  SourceLocation,
  SugarKind,
  TreeNode,
  Type,
  VariableStorage,
} from '../../domain/tree';
import { TextSourceManager } from './TextSourceManager';

type DeclOf<K extends DeclKind> = Extract<Decl, { kind: K }>;
type JsonObject = Record<string, unknown>;

const NAME_KINDS: readonly NameKind[] = [
  'identifier',
  'constructor',
  'destructor',
  'conversion',
  'operator',
  'usingDirective',
  'deductionGuide',
];
const STORAGES: readonly VariableStorage[] = ['staticMember', 'local', 'global'];
const SUGARS: readonly SugarKind[] = ['typedef', 'elaborated', 'decltype', 'auto', 'paren'];
const SPECIFIERS: readonly NestedNameSpecifierKind[] = [
  'namespace',
  'namespaceAlias',
  'type',
  'identifier',
  'global',
  'super',
];

function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function oneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

/**
 * Builds the in-memory resolved tree from its JSON form. Declarations are
 * listed once under `decls` and referenced by id everywhere else, so the
 * resulting declaration graph may share (and cycle through) nodes.
 */
class ResolvedTreeParser {
  private readonly decls = new Map<string, Decl>();
  private rawDecls: JsonObject = {};
  private mainFile = '';

  constructor(private readonly treePath: string) {}

  parse(json: unknown): ResolvedTree {
    const root = this.object(json, '$');
    this.mainFile = this.string(root.mainFile, '$.mainFile');
    const text = this.string(root.text, '$.text');
    this.rawDecls = root.decls === undefined ? {} : this.object(root.decls, '$.decls');

    const nodes = this.array(root.nodes, '$.nodes').map((node, i) =>
      this.node(node, `$.nodes[${i}]`),
    );
    const macros =
      root.macros === undefined
        ? []
        : this.array(root.macros, '$.macros').map((range, i) =>
            this.range(range, `$.macros[${i}]`),
          );

    return {
      mainFile: this.mainFile,
      nodes,
      macros,
      sourceManager: new TextSourceManager(this.mainFile, text),
    };
  }

  private fail(path: string, reason: string): never {
    throw new InvalidTreeError(this.treePath, `${path} ${reason}`);
  }

  private object(value: unknown, path: string): JsonObject {
    if (!isRecord(value)) {
      return this.fail(path, 'must be an object');
    }
    return value;
  }

  private array(value: unknown, path: string): unknown[] {
    if (!Array.isArray(value)) {
      return this.fail(path, 'must be an array');
    }
    return value;
  }

  private string(value: unknown, path: string): string {
    if (typeof value !== 'string') {
      return this.fail(path, 'must be a string');
    }
    return value;
  }

  private boolean(value: unknown, path: string): boolean {
    if (typeof value !== 'boolean') {
      return this.fail(path, 'must be a boolean');
    }
    return value;
  }

  private position(value: unknown, path: string): number {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      return this.fail(path, 'must be a non-negative integer');
    }
    return value;
  }

  private range(value: unknown, path: string): SourceRange {
    const raw = this.object(value, path);
    const start = this.object(raw.start, `${path}.start`);
    const end = this.object(raw.end, `${path}.end`);
    return SourceRange.of(
      this.position(start.line, `${path}.start.line`),
      this.position(start.character, `${path}.start.character`),
      this.position(end.line, `${path}.end.line`),
      this.position(end.character, `${path}.end.character`),
    );
  }

  private fileLocation(raw: JsonObject, path: string): FileLocation {
    return {
      kind: 'file',
      file: raw.file === undefined ? this.mainFile : this.string(raw.file, `${path}.file`),
      line: this.position(raw.line, `${path}.line`),
      character: this.position(raw.character, `${path}.character`),
    };
  }

  private location(value: unknown, path: string): SourceLocation | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    const raw = this.object(value, path);
    if (raw.kind === 'macro') {
      return {
        kind: 'macro',
        argument: this.boolean(raw.argument, `${path}.argument`),
        spelling: this.fileLocation(this.object(raw.spelling, `${path}.spelling`), `${path}.spelling`),
      };
    }
    return this.fileLocation(raw, path);
  }

  private name(value: unknown, path: string): DeclName {
    if (typeof value === 'string') {
      return { kind: 'identifier', text: value };
    }
    const raw = this.object(value, path);
    const kind = this.string(raw.kind, `${path}.kind`);
    if (!oneOf(NAME_KINDS, kind)) {
      return this.fail(`${path}.kind`, `has unknown name kind "${kind}"`);
    }
    return { kind, text: raw.text === undefined ? '' : this.string(raw.text, `${path}.text`) };
  }

  private declRef(value: unknown, path: string): Decl {
    return this.decl(this.string(value, path), path);
  }

  private optionalDeclRef(value: unknown, path: string): Decl | undefined {
    return value === undefined || value === null ? undefined : this.declRef(value, path);
  }

  private declRefs(value: unknown, path: string): Decl[] {
    return this.array(value, path).map((ref, i) => this.declRef(ref, `${path}[${i}]`));
  }

  private decl(id: string, refPath: string): Decl {
    const existing = this.decls.get(id);
    if (existing) {
      return existing;
    }
    const value = Object.hasOwn(this.rawDecls, id) ? this.rawDecls[id] : undefined;
    if (value === undefined) {
      return this.fail(refPath, `references unknown declaration "${id}"`);
    }

    const path = `$.decls.${id}`;
    const raw = this.object(value, path);
    const base = {
      id,
      name: this.name(raw.name, `${path}.name`),
      location: this.location(raw.location, `${path}.location`),
    };
    const kind = this.string(raw.kind, `${path}.kind`);

    // Register before following references so cyclic chains resolve.
    switch (kind) {
      case 'UsingShadow': {
        const decl: DeclOf<'UsingShadow'> = { ...base, kind };
        this.decls.set(id, decl);
        decl.target = this.optionalDeclRef(raw.target, `${path}.target`);
        return decl;
      }
      case 'Template': {
        const decl: DeclOf<'Template'> = { ...base, kind };
        this.decls.set(id, decl);
        decl.templated = this.optionalDeclRef(raw.templated, `${path}.templated`);
        return decl;
      }
      case 'Typedef': {
        const decl: DeclOf<'Typedef'> = { ...base, kind };
        this.decls.set(id, decl);
        decl.underlying = this.optionalType(raw.underlying, `${path}.underlying`);
        return decl;
      }
      case 'NamespaceAlias': {
        const decl: DeclOf<'NamespaceAlias'> = {
          ...base,
          kind,
          targetNameLocation: this.location(raw.targetNameLocation, `${path}.targetNameLocation`),
        };
        this.decls.set(id, decl);
        decl.aliased = this.optionalDeclRef(raw.aliased, `${path}.aliased`);
        return decl;
      }
      case 'Using': {
        const decl: DeclOf<'Using'> = { ...base, kind, shadows: [] };
        this.decls.set(id, decl);
        if (raw.shadows !== undefined) {
          decl.shadows.push(...this.declRefs(raw.shadows, `${path}.shadows`));
        }
        return decl;
      }
      default:
        return this.remember(this.leafDecl(base, kind, raw, path));
    }
  }

  private remember(decl: Decl): Decl {
    this.decls.set(decl.id, decl);
    return decl;
  }

  private leafDecl(
    base: Pick<Decl, 'id' | 'name' | 'location'>,
    kind: string,
    raw: JsonObject,
    path: string,
  ): Decl {
    switch (kind) {
      case 'Record':
        return {
          ...base,
          kind,
          isLambda: raw.isLambda === undefined ? false : this.boolean(raw.isLambda, `${path}.isLambda`),
        };
      case 'Method':
        return {
          ...base,
          kind,
          isStatic: raw.isStatic === undefined ? false : this.boolean(raw.isStatic, `${path}.isStatic`),
        };
      case 'Variable': {
        const storage = raw.storage === undefined ? 'global' : this.string(raw.storage, `${path}.storage`);
        if (!oneOf(STORAGES, storage)) {
          return this.fail(`${path}.storage`, `has unknown storage "${storage}"`);
        }
        return { ...base, kind, storage };
      }
      case 'Constructor':
      case 'Field':
      case 'Enum':
      case 'EnumConstant':
      case 'Parameter':
      case 'Binding':
      case 'Function':
      case 'Namespace':
      case 'UsingDirective':
      case 'TemplateTypeParameter':
      case 'NonTypeTemplateParameter':
      case 'TemplateTemplateParameter':
      case 'Other':
        return { ...base, kind };
      default:
        return this.fail(`${path}.kind`, `has unknown declaration kind "${kind}"`);
    }
  }

  private optionalType(value: unknown, path: string): Type | undefined {
    return value === undefined || value === null ? undefined : this.type(value, path);
  }

  private type(value: unknown, path: string): Type {
    const raw = this.object(value, path);
    const kind = this.string(raw.kind, `${path}.kind`);
    switch (kind) {
      case 'Builtin':
        return { kind, name: raw.name === undefined ? '' : this.string(raw.name, `${path}.name`) };
      case 'TemplateTypeParm':
        return { kind, decl: this.optionalDeclRef(raw.decl, `${path}.decl`) };
      case 'Tag':
        return { kind, decl: this.declRef(raw.decl, `${path}.decl`) };
      case 'Sugared': {
        const sugar = this.string(raw.sugar, `${path}.sugar`);
        if (!oneOf(SUGARS, sugar)) {
          return this.fail(`${path}.sugar`, `has unknown sugar "${sugar}"`);
        }
        return { kind, sugar, underlying: this.optionalType(raw.underlying, `${path}.underlying`) };
      }
      case 'Other':
        return { kind };
      default:
        return this.fail(`${path}.kind`, `has unknown type kind "${kind}"`);
    }
  }

  private node(value: unknown, path: string): TreeNode {
    const raw = this.object(value, path);
    const children =
      raw.children === undefined
        ? undefined
        : this.array(raw.children, `${path}.children`).map((child, i) =>
            this.node(child, `${path}.children[${i}]`),
          );
    const shape = this.string(raw.shape, `${path}.shape`);
    const location = this.location(raw.location, `${path}.location`);

    switch (shape) {
      case 'declaration': {
        const placeholder =
          raw.placeholder === undefined
            ? undefined
            : this.object(raw.placeholder, `${path}.placeholder`);
        return {
          shape,
          children,
          decl: this.declRef(raw.decl, `${path}.decl`),
          placeholder: placeholder && {
            location: this.location(placeholder.location, `${path}.placeholder.location`),
            deduced: this.optionalType(placeholder.deduced, `${path}.placeholder.deduced`),
          },
        };
      }
      case 'declRef':
      case 'memberAccess':
        return {
          shape,
          children,
          location,
          name: this.name(raw.name, `${path}.name`),
          decl: this.declRef(raw.decl, `${path}.decl`),
        };
      case 'overloadRef':
        return {
          shape,
          children,
          location,
          name: this.name(raw.name, `${path}.name`),
          candidates: this.declRefs(raw.candidates, `${path}.candidates`),
        };
      case 'dependentDeclRef':
      case 'dependentMemberAccess':
        return { shape, children, location, name: this.name(raw.name, `${path}.name`) };
      case 'typedefTypeRef':
        return { shape, children, location, decl: this.declRef(raw.decl, `${path}.decl`) };
      case 'templateSpecializationRef':
        return {
          shape,
          children,
          location,
          template: this.optionalDeclRef(raw.template, `${path}.template`),
        };
      case 'tagTypeRef':
        return {
          shape,
          children,
          location,
          type: this.type(raw.type, `${path}.type`),
          isDefinition:
            raw.isDefinition === undefined
              ? false
              : this.boolean(raw.isDefinition, `${path}.isDefinition`),
        };
      case 'decltypeRef':
        return { shape, children, location, type: this.type(raw.type, `${path}.type`) };
      case 'dependentTypeRef':
      case 'templateParameterTypeRef':
        return { shape, children, location };
      case 'namespaceQualifier': {
        const specifier = this.string(raw.specifier, `${path}.specifier`);
        if (!oneOf(SPECIFIERS, specifier)) {
          return this.fail(`${path}.specifier`, `has unknown specifier "${specifier}"`);
        }
        return { shape, children, location, specifier };
      }
      case 'memberInitializer':
        return {
          shape,
          children,
          location,
          member: this.optionalDeclRef(raw.member, `${path}.member`),
        };
      default:
        return this.fail(`${path}.shape`, `has unknown node shape "${shape}"`);
    }
  }
}

export function parseResolvedTree(json: unknown, treePath: string): ResolvedTree {
  return new ResolvedTreeParser(treePath).parse(json);
}
