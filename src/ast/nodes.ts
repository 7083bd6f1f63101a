// ---------------------------------------------------------------------------
// Declaration model -- what a header physically defines, in source order
// ---------------------------------------------------------------------------

export type Declaration =
  | FunctionDeclaration
  | StructDeclaration
  | EnumDeclaration
  | TypedefDeclaration
  | MacroDeclaration
  | NamespaceDeclaration
  | ClassDeclaration

export type DeclarationType = Declaration['type']

// ---- Members ----
export interface FieldDeclaration {
  // '' only for the unnamed member that holds an anonymous struct/union
  name: string
  type: string
  isVolatile: boolean
  isConst: boolean
  isArray: boolean
  arraySize: number | null
}

export interface Parameter {
  name: string
  type: string
}

export interface EnumValue {
  name: string
  value: bigint // signed 64-bit, IRQ numbers go negative
  documentation: string | null
}

// ---- Declarations ----
export interface FunctionDeclaration {
  type: 'Function'
  name: string
  returnType: string
  params: Parameter[]
  isVirtual: boolean
  isStatic: boolean
  isInline: boolean
  isVariadic: boolean
  documentation: string | null
}

export interface StructDeclaration {
  type: 'Struct'
  // '' marks an anonymous aggregate; fields is then non-empty
  name: string
  fields: FieldDeclaration[]
  isUnion: boolean
  documentation: string | null
}

export interface EnumDeclaration {
  type: 'Enum'
  name: string
  values: EnumValue[]
  underlyingType: string | null
  documentation: string | null
}

export interface TypedefDeclaration {
  type: 'Typedef'
  name: string
  underlyingType: string
  documentation: string | null
}

export interface NamespaceDeclaration {
  type: 'Namespace'
  name: string
  declarations: Declaration[]
}

export interface ClassDeclaration {
  type: 'Class'
  name: string
  methods: FunctionDeclaration[]
  fields: FieldDeclaration[]
  isAbstract: boolean
  documentation: string | null
}

// ---- Macros ----
export type MacroKind =
  | SimpleValueMacro
  | ExpressionMacro
  | FunctionLikeMacro
  | TypeCastMacro

export interface SimpleValueMacro {
  kind: 'SimpleValue'
  value: string
}

export interface ExpressionMacro {
  kind: 'Expression'
  expression: string
}

export interface FunctionLikeMacro {
  kind: 'FunctionLike'
  args: string[]
  body: string
}

// #define GPIOA ((GPIO_TypeDef *) GPIOA_BASE)
export interface TypeCastMacro {
  kind: 'TypeCast'
  targetType: string
  address: string
}

export interface MacroDeclaration {
  type: 'Macro'
  name: string
  kind: MacroKind
  rawValue: string
}
