/** Closed set of syntax node kinds. Values double as visitor method suffixes. */
export enum NodeKind {
  Program = "Program",
  Noop = "Noop",

  // Literals
  BoolLiteral = "BoolLiteral",
  IntLiteral = "IntLiteral",
  FloatLiteral = "FloatLiteral",
  StringLiteral = "StringLiteral",
  CharLiteral = "CharLiteral",
  NullLiteral = "NullLiteral",

  // Names
  Identifier = "Identifier",
  QualifiedPath = "QualifiedPath",
  PathSegment = "PathSegment",

  // Type expressions
  PrimitiveType = "PrimitiveType",
  ArrayType = "ArrayType",
  TupleType = "TupleType",
  UnionType = "UnionType",
  FunctionType = "FunctionType",
  PointerType = "PointerType",
  ReferenceType = "ReferenceType",
  OptionalType = "OptionalType",
  ResultType = "ResultType",

  // Expressions
  UnaryExpr = "UnaryExpr",
  BinaryExpr = "BinaryExpr",
  TernaryExpr = "TernaryExpr",
  AssignmentExpr = "AssignmentExpr",
  GroupExpr = "GroupExpr",
  StmtExpr = "StmtExpr",
  StringExpr = "StringExpr",
  CastExpr = "CastExpr",
  CallExpr = "CallExpr",
  IndexExpr = "IndexExpr",
  ArrayExpr = "ArrayExpr",
  TupleExpr = "TupleExpr",
  FieldExpr = "FieldExpr",
  StructExpr = "StructExpr",
  MemberExpr = "MemberExpr",
  MacroCallExpr = "MacroCallExpr",
  ClosureExpr = "ClosureExpr",
  RangeExpr = "RangeExpr",
  SpreadExpr = "SpreadExpr",

  // Statements
  ExprStmt = "ExprStmt",
  BreakStmt = "BreakStmt",
  ContinueStmt = "ContinueStmt",
  DeferStmt = "DeferStmt",
  ReturnStmt = "ReturnStmt",
  YieldStmt = "YieldStmt",
  BlockStmt = "BlockStmt",
  IfStmt = "IfStmt",
  ForStmt = "ForStmt",
  WhileStmt = "WhileStmt",
  SwitchStmt = "SwitchStmt",
  MatchStmt = "MatchStmt",
  CaseStmt = "CaseStmt",
  MatchCase = "MatchCase",

  // Declarations
  VariableDeclaration = "VariableDeclaration",
  FuncDeclaration = "FuncDeclaration",
  FuncParamDeclaration = "FuncParamDeclaration",
  StructDeclaration = "StructDeclaration",
  ClassDeclaration = "ClassDeclaration",
  FieldDeclaration = "FieldDeclaration",
  MethodDeclaration = "MethodDeclaration",
  EnumDeclaration = "EnumDeclaration",
  EnumOptionDeclaration = "EnumOptionDeclaration",
  TypeDeclaration = "TypeDeclaration",
  ImportDeclaration = "ImportDeclaration",
  ImportItem = "ImportItem",
  ModuleDeclaration = "ModuleDeclaration",
  GenericDeclaration = "GenericDeclaration",
  TypeParameterDeclaration = "TypeParameterDeclaration",
  ExternDeclaration = "ExternDeclaration",
  MacroDeclaration = "MacroDeclaration",
  TestDeclaration = "TestDeclaration",

  // Attributes
  Attribute = "Attribute",
  Annotation = "Annotation",
}

// ─── Kind Categories ────────────────────────────────────────────────────────

const LITERAL_KINDS: ReadonlySet<NodeKind> = new Set([
  NodeKind.BoolLiteral,
  NodeKind.IntLiteral,
  NodeKind.FloatLiteral,
  NodeKind.StringLiteral,
  NodeKind.CharLiteral,
  NodeKind.NullLiteral,
]);

const TYPE_EXPRESSION_KINDS: ReadonlySet<NodeKind> = new Set([
  NodeKind.PrimitiveType,
  NodeKind.ArrayType,
  NodeKind.TupleType,
  NodeKind.UnionType,
  NodeKind.FunctionType,
  NodeKind.PointerType,
  NodeKind.ReferenceType,
  NodeKind.OptionalType,
  NodeKind.ResultType,
]);

const EXPRESSION_KINDS: ReadonlySet<NodeKind> = new Set([
  NodeKind.Identifier,
  NodeKind.QualifiedPath,
  NodeKind.UnaryExpr,
  NodeKind.BinaryExpr,
  NodeKind.TernaryExpr,
  NodeKind.AssignmentExpr,
  NodeKind.GroupExpr,
  NodeKind.StmtExpr,
  NodeKind.StringExpr,
  NodeKind.CastExpr,
  NodeKind.CallExpr,
  NodeKind.IndexExpr,
  NodeKind.ArrayExpr,
  NodeKind.TupleExpr,
  NodeKind.FieldExpr,
  NodeKind.StructExpr,
  NodeKind.MemberExpr,
  NodeKind.MacroCallExpr,
  NodeKind.ClosureExpr,
  NodeKind.RangeExpr,
  NodeKind.SpreadExpr,
]);

const STATEMENT_KINDS: ReadonlySet<NodeKind> = new Set([
  NodeKind.ExprStmt,
  NodeKind.BreakStmt,
  NodeKind.ContinueStmt,
  NodeKind.DeferStmt,
  NodeKind.ReturnStmt,
  NodeKind.YieldStmt,
  NodeKind.BlockStmt,
  NodeKind.IfStmt,
  NodeKind.ForStmt,
  NodeKind.WhileStmt,
  NodeKind.SwitchStmt,
  NodeKind.MatchStmt,
  NodeKind.CaseStmt,
  NodeKind.MatchCase,
]);

const DECLARATION_KINDS: ReadonlySet<NodeKind> = new Set([
  NodeKind.VariableDeclaration,
  NodeKind.FuncDeclaration,
  NodeKind.FuncParamDeclaration,
  NodeKind.StructDeclaration,
  NodeKind.ClassDeclaration,
  NodeKind.FieldDeclaration,
  NodeKind.MethodDeclaration,
  NodeKind.EnumDeclaration,
  NodeKind.EnumOptionDeclaration,
  NodeKind.TypeDeclaration,
  NodeKind.ImportDeclaration,
  NodeKind.ImportItem,
  NodeKind.ModuleDeclaration,
  NodeKind.GenericDeclaration,
  NodeKind.TypeParameterDeclaration,
  NodeKind.ExternDeclaration,
  NodeKind.MacroDeclaration,
  NodeKind.TestDeclaration,
]);

export function isLiteralKind(kind: NodeKind): boolean {
  return LITERAL_KINDS.has(kind);
}

export function isTypeExpressionKind(kind: NodeKind): boolean {
  return TYPE_EXPRESSION_KINDS.has(kind);
}

/** Literals count as expressions. */
export function isExpressionKind(kind: NodeKind): boolean {
  return EXPRESSION_KINDS.has(kind) || LITERAL_KINDS.has(kind);
}

export function isStatementKind(kind: NodeKind): boolean {
  return STATEMENT_KINDS.has(kind);
}

export function isDeclarationKind(kind: NodeKind): boolean {
  return DECLARATION_KINDS.has(kind);
}
