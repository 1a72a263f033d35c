/**
 * PEG grammar for field length and condition expressions.
 * C operator precedence; compiled by peggy at runtime.
 */
export const EXPRESSION_GRAMMAR = `
{
  // Left-fold "head (op operand)*" into nested binary nodes
  function fold(head, tail) {
    return tail.reduce(function(left, part) {
      return { kind: "binary", op: part[1], left: left, right: part[3] };
    }, head);
  }
}

Expression
  = _ expr:LogicalOr _ { return expr; }

LogicalOr
  = head:LogicalAnd tail:(_ "||" _ LogicalAnd)* { return fold(head, tail); }

LogicalAnd
  = head:BitOr tail:(_ "&&" _ BitOr)* { return fold(head, tail); }

BitOr
  = head:BitXor tail:(_ $("|" !"|") _ BitXor)* { return fold(head, tail); }

BitXor
  = head:BitAnd tail:(_ "^" _ BitAnd)* { return fold(head, tail); }

BitAnd
  = head:Equality tail:(_ $("&" !"&") _ Equality)* { return fold(head, tail); }

Equality
  = head:Relational tail:(_ ("==" / "!=") _ Relational)* { return fold(head, tail); }

Relational
  = head:Shift tail:(_ ("<=" / ">=" / $("<" !"<") / $(">" !">")) _ Shift)* { return fold(head, tail); }

Shift
  = head:Additive tail:(_ ("<<" / ">>") _ Additive)* { return fold(head, tail); }

Additive
  = head:Multiplicative tail:(_ ("+" / "-") _ Multiplicative)* { return fold(head, tail); }

Multiplicative
  = head:Unary tail:(_ ("*" / "/" / "%") _ Unary)* { return fold(head, tail); }

Unary
  = op:("!" / "~" / "-") _ operand:Unary
    {
      return { kind: "unary", op: op, operand: operand };
    }
  / Primary

Primary
  = "(" _ expr:LogicalOr _ ")" { return expr; }
  / Number
  / Reference

Number
  = "0x"i digits:$[0-9a-fA-F]+ { return { kind: "literal", value: parseInt(digits, 16) }; }
  / "0b"i digits:$[01]+ { return { kind: "literal", value: parseInt(digits, 2) }; }
  / digits:$[0-9]+ { return { kind: "literal", value: parseInt(digits, 10) }; }

Reference
  = name:$(Identifier ("." Identifier)*) { return { kind: "ref", name: name }; }

Identifier
  = [A-Za-z_][A-Za-z0-9_]*

_
  = [ \\t\\n\\r]*
`;
