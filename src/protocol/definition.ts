import { Static, Type } from '@sinclair/typebox';

const IDENTIFIER = '^[A-Za-z_][A-Za-z0-9_]*$';

export const INTEGER_TYPE_NAMES = ['u8', 'u16', 'u32', 'u64', 'i8', 'i16', 'i32', 'i64'] as const;

/** Enum values are held as numbers, so enums stop at 32-bit widths. */
export const ENUM_TYPE_NAMES = ['u8', 'u16', 'u32', 'i8', 'i16', 'i32'] as const;

/** An integer literal, or a `0x`-prefixed hex string. */
export const IntegerLiteralSchema = Type.Union([
  Type.Integer(),
  Type.String({ pattern: '^0x[0-9A-Fa-f]+$' }),
]);

export const EnumValueSchema = Type.Object(
  {
    name: Type.String({ pattern: IDENTIFIER }),
    value: IntegerLiteralSchema,
    description: Type.Optional(Type.String()),
  },
  { additionalProperties: false },
);

export const EnumDefinitionSchema = Type.Object(
  {
    name: Type.String({ pattern: IDENTIFIER }),
    type: Type.Union(ENUM_TYPE_NAMES.map(t => Type.Literal(t))),
    description: Type.Optional(Type.String()),
    values: Type.Array(EnumValueSchema, { minItems: 1 }),
  },
  { additionalProperties: false },
);

/** One named slice of a `bitfield_u8/u16/u32` container. */
export const BitDefinitionSchema = Type.Object(
  {
    name: Type.String({ pattern: IDENTIFIER }),
    /** Bit offset from the least-significant bit. */
    offset: Type.Integer({ minimum: 0 }),
    width: Type.Integer({ minimum: 1 }),
    /** Enum name for this slice. */
    type: Type.Optional(Type.String({ pattern: IDENTIFIER })),
    description: Type.Optional(Type.String()),
  },
  { additionalProperties: false },
);

export const FieldDefinitionSchema = Type.Object(
  {
    name: Type.String({ pattern: IDENTIFIER }),
    /** Primitive, enum or struct name, or one of: bytes, string, array, padding, bitfield_u8/u16/u32. */
    type: Type.String(),
    description: Type.Optional(Type.String()),
    /** Fixed size for bytes/string/array: a positive integer or an expression over earlier fields. */
    length: Type.Optional(Type.Union([Type.Integer({ minimum: 1 }), Type.String({ minLength: 1 })])),
    element_type: Type.Optional(Type.String()),
    /** Magic number or version guard checked on decode. */
    expected: Type.Optional(Type.Union([Type.Integer(), Type.String()])),
    pad_size: Type.Optional(Type.Integer({ minimum: 1 })),
    /** Expression guarding presence of this field. */
    condition: Type.Optional(Type.String({ minLength: 1 })),
    bits: Type.Optional(Type.Array(BitDefinitionSchema, { minItems: 1 })),
  },
  { additionalProperties: false },
);

export const StructDefinitionSchema = Type.Object(
  {
    name: Type.String({ pattern: IDENTIFIER }),
    description: Type.Optional(Type.String()),
    fields: Type.Array(FieldDefinitionSchema, { minItems: 1 }),
  },
  { additionalProperties: false },
);

export const ProtocolDocumentSchema = Type.Object(
  {
    protocol: Type.Object(
      {
        name: Type.String({ pattern: IDENTIFIER }),
        byte_order: Type.Optional(Type.Union([Type.Literal('little_endian'), Type.Literal('big_endian')])),
        description: Type.Optional(Type.String()),
      },
      { additionalProperties: false },
    ),
    enums: Type.Optional(Type.Array(EnumDefinitionSchema)),
    structs: Type.Optional(Type.Array(StructDefinitionSchema)),
  },
  { additionalProperties: false },
);

export type IntegerTypeName = (typeof INTEGER_TYPE_NAMES)[number];
export type EnumValueDefinition = Static<typeof EnumValueSchema>;
export type EnumDefinition = Static<typeof EnumDefinitionSchema>;
export type BitDefinition = Static<typeof BitDefinitionSchema>;
export type FieldDefinition = Static<typeof FieldDefinitionSchema>;
export type StructDefinition = Static<typeof StructDefinitionSchema>;
export type ProtocolDocument = Static<typeof ProtocolDocumentSchema>;

/** Parse an integer literal as written in a protocol file (`42` or `"0x2A"`). */
export function parseIntegerLiteral(value: number | string): number {
  return typeof value === 'number' ? value : parseInt(value.slice(2), 16);
}
