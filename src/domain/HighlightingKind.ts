// Ordinals are part of the wire format. Append only.
export enum HighlightingKind {
  Variable = 0,
  LocalVariable,
  Parameter,
  Function,
  Method,
  StaticMethod,
  Field,
  StaticField,
  Class,
  Enum,
  EnumConstant,
  Typedef,
  DependentType,
  DependentName,
  Namespace,
  TemplateParameter,
  Primitive,
  Macro,
}

export const ALL_KINDS: readonly HighlightingKind[] = Object.values(HighlightingKind).filter(
  (value): value is HighlightingKind => typeof value === 'number',
);

export function kindName(kind: HighlightingKind): string {
  return HighlightingKind[kind];
}

export function isHighlightingKind(value: number): value is HighlightingKind {
  return Number.isInteger(value) && value >= 0 && value <= HighlightingKind.Macro;
}

/**
 * Fallback style scope for clients that color by TextMate scope instead of
 * by kind ordinal.
 */
export function toTextMateScope(kind: HighlightingKind): string {
  switch (kind) {
    case HighlightingKind.Function:
      return 'entity.name.function.cpp';
    case HighlightingKind.Method:
      return 'entity.name.function.method.cpp';
    case HighlightingKind.StaticMethod:
      return 'entity.name.function.method.static.cpp';
    case HighlightingKind.Variable:
      return 'variable.other.cpp';
    case HighlightingKind.LocalVariable:
      return 'variable.other.local.cpp';
    case HighlightingKind.Parameter:
      return 'variable.parameter.cpp';
    case HighlightingKind.Field:
      return 'variable.other.field.cpp';
    case HighlightingKind.StaticField:
      return 'variable.other.field.static.cpp';
    case HighlightingKind.Class:
      return 'entity.name.type.class.cpp';
    case HighlightingKind.Enum:
      return 'entity.name.type.enum.cpp';
    case HighlightingKind.EnumConstant:
      return 'variable.other.enummember.cpp';
    case HighlightingKind.Typedef:
      return 'entity.name.type.typedef.cpp';
    case HighlightingKind.DependentType:
      return 'entity.name.type.dependent.cpp';
    case HighlightingKind.DependentName:
      return 'entity.name.other.dependent.cpp';
    case HighlightingKind.Namespace:
      return 'entity.name.namespace.cpp';
    case HighlightingKind.TemplateParameter:
      return 'entity.name.type.template.cpp';
    case HighlightingKind.Primitive:
      return 'storage.type.primitive.cpp';
    case HighlightingKind.Macro:
      return 'entity.name.function.preprocessor.cpp';
  }
}

/** Scope table indexed by kind ordinal, one scope per kind. */
export function getTextMateScopes(): string[][] {
  return ALL_KINDS.map((kind) => [toTextMateScope(kind)]);
}
