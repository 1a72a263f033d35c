import type { ByteReader } from '../ByteReader';
import type { ByteWriter } from '../ByteWriter';
import { readOk } from '../Status';
import { EnumDefinition, parseIntegerLiteral } from '../protocol/definition';
import { CodecContext, CodecResult, CodecStatus, FieldCodec, FieldValue, describeValue, fail } from './FieldCodec';
import { PrimitiveCodec, toScopeNumber } from './PrimitiveCodec';

/**
 * Name/value lookup for one enum. Raw values with no declared name map to
 * the first declared value.
 */
export class EnumTable {
  readonly name: string;
  private readonly names: readonly string[];
  private readonly byValue: Map<number, string>;
  private readonly byName: Map<string, number>;

  constructor(definition: EnumDefinition) {
    this.name = definition.name;
    this.names = definition.values.map(v => v.name);
    this.byValue = new Map();
    this.byName = new Map();
    for (const v of definition.values) {
      const raw = parseIntegerLiteral(v.value);
      if (!this.byValue.has(raw)) this.byValue.set(raw, v.name);
      this.byName.set(v.name, raw);
    }
  }

  nameOf(raw: number): string {
    return this.byValue.get(raw) ?? this.names[0];
  }

  valueOf(name: string): number | undefined {
    return this.byName.get(name);
  }
}

/** Enum field stored as its underlying integer type; decodes to the value name. */
export class EnumCodec implements FieldCodec {
  readonly typeName: string;
  private readonly table: EnumTable;
  private readonly underlying: PrimitiveCodec;

  constructor(definition: EnumDefinition) {
    this.typeName = definition.name;
    this.table = new EnumTable(definition);
    this.underlying = new PrimitiveCodec(definition.type);
  }

  decode(reader: ByteReader, ctx: CodecContext): CodecResult<FieldValue> {
    const r = this.underlying.decode(reader, ctx);
    if (!r.ok) return r;
    const raw = toScopeNumber(r.value) ?? 0;
    return readOk(this.table.nameOf(raw));
  }

  encode(writer: ByteWriter, value: FieldValue | undefined, ctx: CodecContext): CodecStatus {
    const raw = this.rawOf(value, ctx);
    if (!raw.ok) return raw;
    return this.underlying.encode(writer, raw.value, ctx);
  }

  sizeOf(): CodecResult<number> {
    return readOk(this.underlying.size);
  }

  exportScope(name: string, value: FieldValue, scope: Map<string, number>): void {
    if (typeof value !== 'string') return;
    const raw = this.table.valueOf(value);
    if (raw !== undefined) scope.set(name, raw);
  }

  private rawOf(value: FieldValue | undefined, ctx: CodecContext): CodecResult<number> {
    if (typeof value !== 'string') {
      return fail('INVALID_VALUE', ctx.path, `Expected a ${this.typeName} name at '${ctx.path}', got ${describeValue(value)}`);
    }
    const raw = this.table.valueOf(value);
    if (raw === undefined) {
      return fail('INVALID_VALUE', ctx.path, `Unknown ${this.typeName} value '${value}' at '${ctx.path}'`);
    }
    return readOk(raw);
  }
}
