import { SourceRange } from './SourceRange';

export interface FileLocation {
  kind: 'file';
  file: string;
  line: number;
  character: number;
}

export interface MacroLocation {
  kind: 'macro';
  // True when the location is inside a macro argument (DEF_X(arg)), false for
  // tokens that come from the macro body.
  argument: boolean;
  spelling: FileLocation;
}

export type SourceLocation = FileLocation | MacroLocation;

export type NameKind =
  | 'identifier'
  | 'constructor'
  | 'destructor'
  | 'conversion'
  | 'operator'
  | 'usingDirective'
  | 'deductionGuide';

export interface DeclName {
  kind: NameKind;
  text: string;
}

interface DeclBase {
  id: string;
  name: DeclName;
  location?: SourceLocation;
}

export type VariableStorage = 'staticMember' | 'local' | 'global';

export type Decl = DeclBase &
  (
    | { kind: 'UsingShadow'; target?: Decl }
    | { kind: 'Template'; templated?: Decl }
    | { kind: 'Typedef'; underlying?: Type }
    | { kind: 'Record'; isLambda: boolean }
    | { kind: 'Constructor' }
    | { kind: 'Method'; isStatic: boolean }
    | { kind: 'Field' }
    | { kind: 'Enum' }
    | { kind: 'EnumConstant' }
    | { kind: 'Parameter' }
    | { kind: 'Variable'; storage: VariableStorage }
    | { kind: 'Binding' }
    | { kind: 'Function' }
    | { kind: 'Namespace' }
    | { kind: 'NamespaceAlias'; aliased?: Decl; targetNameLocation?: SourceLocation }
    | { kind: 'UsingDirective' }
    | { kind: 'Using'; shadows: Decl[] }
    | { kind: 'TemplateTypeParameter' }
    | { kind: 'NonTypeTemplateParameter' }
    | { kind: 'TemplateTemplateParameter' }
    | { kind: 'Other' }
  );

export type DeclKind = Decl['kind'];

export type SugarKind = 'typedef' | 'elaborated' | 'decltype' | 'auto' | 'paren';

export type Type =
  | { kind: 'Builtin'; name: string }
  | { kind: 'TemplateTypeParm'; decl?: Decl }
  | { kind: 'Tag'; decl: Decl }
  | { kind: 'Sugared'; sugar: SugarKind; underlying?: Type }
  | { kind: 'Other' };

export interface PlaceholderType {
  location?: SourceLocation;
  deduced?: Type;
}

export type NestedNameSpecifierKind =
  | 'namespace'
  | 'namespaceAlias'
  | 'type'
  | 'identifier'
  | 'global'
  | 'super';

interface NodeBase {
  children?: TreeNode[];
}

export type TreeNode = NodeBase &
  (
    | { shape: 'declaration'; decl: Decl; placeholder?: PlaceholderType }
    | { shape: 'declRef'; name: DeclName; location?: SourceLocation; decl: Decl }
    | { shape: 'memberAccess'; name: DeclName; location?: SourceLocation; decl: Decl }
    | { shape: 'overloadRef'; name: DeclName; location?: SourceLocation; candidates: Decl[] }
    | { shape: 'dependentDeclRef'; name: DeclName; location?: SourceLocation }
    | { shape: 'dependentMemberAccess'; name: DeclName; location?: SourceLocation }
    | { shape: 'typedefTypeRef'; location?: SourceLocation; decl: Decl }
    | { shape: 'templateSpecializationRef'; location?: SourceLocation; template?: Decl }
    | { shape: 'tagTypeRef'; location?: SourceLocation; type: Type; isDefinition: boolean }
    | { shape: 'decltypeRef'; location?: SourceLocation; type: Type }
    | { shape: 'dependentTypeRef'; location?: SourceLocation }
    | { shape: 'templateParameterTypeRef'; location?: SourceLocation }
    | {
        shape: 'namespaceQualifier';
        location?: SourceLocation;
        specifier: NestedNameSpecifierKind;
      }
    | { shape: 'memberInitializer'; location?: SourceLocation; member?: Decl }
  );

export type NodeShape = TreeNode['shape'];

export interface SourceManager {
  isInsideMainFile(location: FileLocation): boolean;
  // undefined means the location does not start a token
  getTokenRange(location: FileLocation): SourceRange | undefined;
}

export interface ResolvedTree {
  mainFile: string;
  nodes: TreeNode[];
  macros: SourceRange[];
  sourceManager: SourceManager;
}
