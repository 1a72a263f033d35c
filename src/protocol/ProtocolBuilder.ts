import { ProtocolError } from '../ProtocolError';
import { parseExpression, references } from '../expression';
import type { Expression } from '../expression';
import { ArrayCodec } from '../codecs/ArrayCodec';
import { BITFIELD_CONTAINERS, BitSlice, BitfieldCodec, isBitfieldContainerName } from '../codecs/BitfieldCodec';
import { BytesCodec } from '../codecs/BytesCodec';
import { EnumCodec, EnumTable } from '../codecs/EnumCodec';
import { ExpectedValueCodec } from '../codecs/ExpectedValueCodec';
import type { FieldCodec, FieldValue } from '../codecs/FieldCodec';
import { LazyCodec } from '../codecs/LazyCodec';
import { PRIMITIVES, PrimitiveCodec, isPrimitiveName } from '../codecs/PrimitiveCodec';
import { StringCodec } from '../codecs/StringCodec';
import { StructCodec, StructMember } from '../codecs/StructCodec';
import type { LengthSpec } from '../codecs/length';
import {
  EnumDefinition,
  FieldDefinition,
  ProtocolDocument,
  StructDefinition,
} from './definition';

export type TypeKind =
  | 'primitive'
  | 'enum'
  | 'struct'
  | 'bytes'
  | 'string'
  | 'array'
  | 'bitfield'
  | 'padding';

const RESERVED_TYPE_NAMES = new Set([
  ...Object.keys(PRIMITIVES),
  ...Object.keys(BITFIELD_CONTAINERS),
  'bytes',
  'string',
  'array',
  'padding',
]);

// Decoded structs and bitfields are plain objects keyed by these names
const FORBIDDEN_MEMBER_NAMES = new Set(['__proto__']);

function definitionError(message: string): ProtocolError {
  return new ProtocolError('INVALID_DEFINITION', message);
}

/**
 * Turns a validated protocol document into struct codecs.
 *
 * Struct references resolve lazily, so structs may be declared in any
 * order. Expressions may only refer to fields declared earlier in the
 * same struct.
 */
export class ProtocolBuilder {
  private readonly enums = new Map<string, EnumDefinition>();
  private readonly structs = new Map<string, StructDefinition>();
  private readonly codecs = new Map<string, StructCodec>();

  private constructor(document: ProtocolDocument) {
    for (const e of document.enums ?? []) {
      if (RESERVED_TYPE_NAMES.has(e.name)) throw definitionError(`Enum name '${e.name}' is reserved`);
      if (this.enums.has(e.name)) throw definitionError(`Duplicate enum '${e.name}'`);
      this.enums.set(e.name, e);
    }
    for (const s of document.structs ?? []) {
      if (RESERVED_TYPE_NAMES.has(s.name)) throw definitionError(`Struct name '${s.name}' is reserved`);
      if (this.structs.has(s.name) || this.enums.has(s.name)) {
        throw definitionError(`Duplicate type name '${s.name}'`);
      }
      this.structs.set(s.name, s);
    }
  }

  /** Build a codec for every struct in the document, keyed by struct name. */
  static build(document: ProtocolDocument): Map<string, StructCodec> {
    const builder = new ProtocolBuilder(document);
    for (const s of builder.structs.values()) {
      builder.codecs.set(s.name, builder.buildStruct(s));
    }
    builder.checkCycles();
    return builder.codecs;
  }

  /** Classify a field's declared type, in the same precedence as the type names are reserved. */
  private resolveKind(field: FieldDefinition): TypeKind {
    if (field.type === 'padding') return 'padding';
    if (isBitfieldContainerName(field.type)) return 'bitfield';
    if (field.type === 'bytes') return 'bytes';
    if (field.type === 'string') return 'string';
    if (field.type === 'array') return 'array';
    if (this.enums.has(field.type)) return 'enum';
    if (this.structs.has(field.type)) return 'struct';
    if (isPrimitiveName(field.type)) return 'primitive';
    throw new ProtocolError('UNKNOWN_TYPE', `Unknown type '${field.type}' in field '${field.name}'`);
  }

  private buildStruct(definition: StructDefinition): StructCodec {
    const members: StructMember[] = [];
    const names = new Set<string>();
    // Names visible to expressions of later fields
    const visible = new Set<string>();

    for (const field of definition.fields) {
      const where = `${definition.name}.${field.name}`;
      if (FORBIDDEN_MEMBER_NAMES.has(field.name)) throw definitionError(`Field name '${where}' is reserved`);
      if (names.has(field.name)) throw definitionError(`Duplicate field '${where}'`);
      names.add(field.name);

      const kind = this.resolveKind(field);
      if (kind === 'padding') {
        if (field.pad_size === undefined) throw definitionError(`Padding field '${where}' requires pad_size`);
        members.push({ kind: 'padding', name: field.name, size: field.pad_size });
        continue;
      }

      let codec = this.buildFieldCodec(field, kind, where, visible);
      if (field.expected !== undefined) {
        codec = new ExpectedValueCodec(codec, this.expectedValue(field, kind, where));
      }
      const condition = field.condition === undefined
        ? undefined
        : this.expression(field.condition, where, visible);

      members.push({ kind: 'field', name: field.name, codec, condition });

      visible.add(field.name);
      for (const bit of field.bits ?? []) visible.add(`${field.name}.${bit.name}`);
    }

    return new StructCodec(definition.name, members);
  }

  private buildFieldCodec(
    field: FieldDefinition,
    kind: Exclude<TypeKind, 'padding'>,
    where: string,
    visible: ReadonlySet<string>,
  ): FieldCodec {
    switch (kind) {
      case 'primitive':
      case 'enum':
      case 'struct':
        return this.namedCodec(field.type, where);

      case 'bitfield':
        return this.buildBitfield(field, where);

      case 'bytes':
        return new BytesCodec(this.length(field, where, visible));

      case 'string':
        return new StringCodec(this.length(field, where, visible));

      case 'array': {
        if (field.element_type === undefined) throw definitionError(`Array field '${where}' requires element_type`);
        const element = this.namedCodec(field.element_type, where);
        return new ArrayCodec(element, this.length(field, where, visible));
      }
    }
  }

  /** Codec for a primitive, enum or struct referred to by name. */
  private namedCodec(typeName: string, where: string): FieldCodec {
    const enumDef = this.enums.get(typeName);
    if (enumDef) return new EnumCodec(enumDef);
    if (this.structs.has(typeName)) {
      return new LazyCodec(typeName, () => {
        const target = this.codecs.get(typeName);
        if (!target) throw new ProtocolError('UNKNOWN_TYPE', `Unresolved struct '${typeName}'`);
        return target;
      });
    }
    if (isPrimitiveName(typeName)) return new PrimitiveCodec(typeName);
    throw new ProtocolError('UNKNOWN_TYPE', `Unknown type '${typeName}' in field '${where}'`);
  }

  private buildBitfield(field: FieldDefinition, where: string): BitfieldCodec {
    const container = BITFIELD_CONTAINERS[field.type];
    const bits = field.bits;
    if (!bits) throw definitionError(`Bitfield '${where}' requires bits`);
    const containerBits = PRIMITIVES[container].size * 8;

    const slices: BitSlice[] = [];
    let used = 0;
    for (const bit of bits) {
      if (bit.offset + bit.width > containerBits) {
        throw definitionError(`Bit slice '${where}.${bit.name}' does not fit in ${containerBits} bits`);
      }
      if (FORBIDDEN_MEMBER_NAMES.has(bit.name)) {
        throw definitionError(`Bit slice name '${where}.${bit.name}' is reserved`);
      }
      if (slices.some(s => s.name === bit.name)) {
        throw definitionError(`Duplicate bit slice '${where}.${bit.name}'`);
      }
      const mask = (2 ** bit.width - 1) * 2 ** bit.offset;
      // Both masks stay below 2^32, so 32-bit & is exact after >>> 0
      if (((used & mask) >>> 0) !== 0) {
        throw definitionError(`Bit slice '${where}.${bit.name}' overlaps another slice`);
      }
      used = (used | mask) >>> 0;

      let enumTable: EnumTable | undefined;
      if (bit.type !== undefined) {
        const enumDef = this.enums.get(bit.type);
        if (!enumDef) throw new ProtocolError('UNKNOWN_TYPE', `Unknown enum '${bit.type}' in bit slice '${where}.${bit.name}'`);
        enumTable = new EnumTable(enumDef);
      }
      slices.push({ name: bit.name, offset: bit.offset, width: bit.width, enumTable });
    }

    return new BitfieldCodec(container, slices);
  }

  private length(field: FieldDefinition, where: string, visible: ReadonlySet<string>): LengthSpec {
    if (field.length === undefined) throw definitionError(`Field '${where}' of type ${field.type} requires length`);
    return typeof field.length === 'number'
      ? field.length
      : this.expression(field.length, where, visible);
  }

  private expression(source: string, where: string, visible: ReadonlySet<string>): Expression {
    const expr = parseExpression(source);
    for (const name of references(expr)) {
      if (!visible.has(name)) {
        throw new ProtocolError(
          'INVALID_EXPRESSION',
          `Expression "${source}" in '${where}' refers to '${name}', which is not an earlier field`,
        );
      }
    }
    return expr;
  }

  private expectedValue(field: FieldDefinition, kind: TypeKind, where: string): FieldValue {
    const expected = field.expected;
    if (expected === undefined) throw definitionError(`Field '${where}' has no expected value`);

    if (kind === 'string' || kind === 'enum') {
      if (typeof expected !== 'string') throw definitionError(`Expected value of '${where}' must be a string`);
      if (kind === 'enum') {
        const enumDef = this.enums.get(field.type);
        if (!enumDef?.values.some(v => v.name === expected)) {
          throw definitionError(`Expected value '${expected}' of '${where}' is not a ${field.type} value`);
        }
      }
      return expected;
    }

    const type = field.type;
    if (kind === 'primitive' && isPrimitiveName(type)) {
      const wide = PRIMITIVES[type].kind === 'bigint';
      if (typeof expected === 'number') return wide ? BigInt(expected) : expected;
      if (!/^0x[0-9A-Fa-f]+$/.test(expected)) {
        throw definitionError(`Expected value '${expected}' of '${where}' is not an integer`);
      }
      return wide ? BigInt(expected) : parseInt(expected.slice(2), 16);
    }

    throw definitionError(`Field '${where}' of type ${field.type} cannot have an expected value`);
  }

  /** Reject structs that contain themselves unconditionally; they could never finish decoding. */
  private checkCycles(): void {
    const edges = new Map<string, string[]>();
    for (const s of this.structs.values()) {
      const targets: string[] = [];
      for (const f of s.fields) {
        if (f.condition !== undefined) continue;
        if (this.structs.has(f.type)) targets.push(f.type);
        if (f.type === 'array' && typeof f.length === 'number' && f.element_type && this.structs.has(f.element_type)) {
          targets.push(f.element_type);
        }
      }
      edges.set(s.name, targets);
    }

    const done = new Set<string>();
    const active = new Set<string>();
    const visit = (name: string): void => {
      if (done.has(name)) return;
      if (active.has(name)) throw definitionError(`Struct '${name}' contains itself unconditionally`);
      active.add(name);
      for (const next of edges.get(name) ?? []) visit(next);
      active.delete(name);
      done.add(name);
    };
    for (const name of edges.keys()) visit(name);
  }
}
