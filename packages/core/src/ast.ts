/**
 * Tally source-language AST node definitions.
 * A front end builds these; the lowering pass turns them into instructions.
 */
import type { Span } from "./diagnostics.js";

// Base node with optional span (hand-built trees carry none)
export interface BaseNode {
  kind: string;
  span?: Span;
}

// --- Expressions ---
export interface Identifier extends BaseNode {
  kind: "Identifier";
  name: string;
}

export interface IntLiteral extends BaseNode {
  kind: "IntLiteral";
  value: bigint;
}

export interface BoolLiteral extends BaseNode {
  kind: "BoolLiteral";
  value: boolean;
}

export type Literal = IntLiteral | BoolLiteral;

export type BinaryOp =
  | "+" | "-" | "*" | "/" | "%"
  | "&&" | "||"
  | "==" | "!=" | "<" | "<=" | ">" | ">=";

export interface BinaryExpr extends BaseNode {
  kind: "BinaryExpr";
  op: BinaryOp;
  left: Expr;
  right: Expr;
}

export type UnaryOp = "-" | "!";

export interface UnaryExpr extends BaseNode {
  kind: "UnaryExpr";
  op: UnaryOp;
  operand: Expr;
}

export interface FunCallExpr extends BaseNode {
  kind: "FunCallExpr";
  name: string;
  args: Expr[];
}

export type Expr = Identifier | Literal | BinaryExpr | UnaryExpr | FunCallExpr;

// --- Statements ---
export interface BlockStmt extends BaseNode {
  kind: "BlockStmt";
  body: Stmt[];
}

export interface WhileStmt extends BaseNode {
  kind: "WhileStmt";
  test: Expr;
  body: Stmt;
}

export interface IfStmt extends BaseNode {
  kind: "IfStmt";
  test: Expr;
  then: Stmt;
  else?: Stmt;
}

export interface ReturnStmt extends BaseNode {
  kind: "ReturnStmt";
  value?: Expr;
}

export interface DeclarationStmt extends BaseNode {
  kind: "DeclarationStmt";
  name: string;
  value: Expr;
}

export interface FunDeclStmt extends BaseNode {
  kind: "FunDeclStmt";
  name: string;
  params: Identifier[];
  returnType?: string;
  body: Stmt;
}

export interface AssignmentStmt extends BaseNode {
  kind: "AssignmentStmt";
  target: Expr;
  value: Expr;
}

export interface ForStmt extends BaseNode {
  kind: "ForStmt";
  init: Stmt;
  test: Expr;
  update: Stmt;
  body: Stmt;
}

export type Stmt =
  | BlockStmt
  | WhileStmt
  | IfStmt
  | ReturnStmt
  | DeclarationStmt
  | FunDeclStmt
  | AssignmentStmt
  | ForStmt;
