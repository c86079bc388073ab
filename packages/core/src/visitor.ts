/**
 * AST visitor with default structural recursion.
 *
 * A pass implements `Visitor` and calls `walkStmt` / `walkExpr` for the nodes
 * it does not handle itself, so each pass only spells out what it cares about.
 */
import type * as AST from "./ast.js";

export interface Visitor {
  visitStmt(s: AST.Stmt): void;
  visitExpr(e: AST.Expr): void;
}

export function walkStmt(v: Visitor, s: AST.Stmt): void {
  switch (s.kind) {
    case "BlockStmt":
      for (const stmt of s.body) {
        v.visitStmt(stmt);
      }
      return;
    case "WhileStmt":
      v.visitExpr(s.test);
      v.visitStmt(s.body);
      return;
    case "IfStmt":
      v.visitExpr(s.test);
      v.visitStmt(s.then);
      if (s.else) v.visitStmt(s.else);
      return;
    case "ReturnStmt":
      if (s.value) v.visitExpr(s.value);
      return;
    case "DeclarationStmt":
      v.visitExpr(s.value);
      return;
    case "FunDeclStmt":
      for (const param of s.params) {
        v.visitExpr(param);
      }
      v.visitStmt(s.body);
      return;
    case "AssignmentStmt":
      v.visitExpr(s.target);
      v.visitExpr(s.value);
      return;
    case "ForStmt":
      v.visitStmt(s.init);
      v.visitExpr(s.test);
      v.visitStmt(s.update);
      v.visitStmt(s.body);
      return;
  }
}

export function walkExpr(v: Visitor, e: AST.Expr): void {
  switch (e.kind) {
    case "Identifier":
    case "IntLiteral":
    case "BoolLiteral":
      return;
    case "BinaryExpr":
      v.visitExpr(e.left);
      v.visitExpr(e.right);
      return;
    case "UnaryExpr":
      v.visitExpr(e.operand);
      return;
    case "FunCallExpr":
      for (const arg of e.args) {
        v.visitExpr(arg);
      }
      return;
  }
}
