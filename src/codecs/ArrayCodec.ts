import type { ByteReader } from '../ByteReader';
import type { ByteWriter } from '../ByteWriter';
import { SUCCESS, readOk } from '../Status';
import { CodecContext, CodecResult, CodecStatus, FieldCodec, FieldValue, describeValue, fail } from './FieldCodec';
import { LengthSpec, resolveLength } from './length';

/** A counted run of elements of one type. */
export class ArrayCodec implements FieldCodec {
  readonly typeName: string;
  private readonly element: FieldCodec;
  private readonly length: LengthSpec;

  constructor(element: FieldCodec, length: LengthSpec) {
    this.typeName = `${element.typeName}[]`;
    this.element = element;
    this.length = length;
  }

  decode(reader: ByteReader, ctx: CodecContext): CodecResult<FieldValue> {
    const n = resolveLength(this.length, ctx);
    if (!n.ok) return n;
    const items: FieldValue[] = [];
    for (let i = 0; i < n.value; i++) {
      const r = this.element.decode(reader, elementContext(ctx, i));
      if (!r.ok) return r;
      items.push(r.value);
    }
    return readOk(items);
  }

  encode(writer: ByteWriter, value: FieldValue | undefined, ctx: CodecContext): CodecStatus {
    const items = this.checkItems(value, ctx);
    if (!items.ok) return items;
    for (let i = 0; i < items.value.length; i++) {
      const status = this.element.encode(writer, items.value[i], elementContext(ctx, i));
      if (!status.ok) return status;
    }
    return SUCCESS;
  }

  sizeOf(value: FieldValue | undefined, ctx: CodecContext): CodecResult<number> {
    const items = this.checkItems(value, ctx);
    if (!items.ok) return items;
    let total = 0;
    for (let i = 0; i < items.value.length; i++) {
      const size = this.element.sizeOf(items.value[i], elementContext(ctx, i));
      if (!size.ok) return size;
      total += size.value;
    }
    return readOk(total);
  }

  private checkItems(value: FieldValue | undefined, ctx: CodecContext): CodecResult<FieldValue[]> {
    const n = resolveLength(this.length, ctx);
    if (!n.ok) return n;
    if (!Array.isArray(value)) {
      return fail('INVALID_VALUE', ctx.path, `Expected an array at '${ctx.path}', got ${describeValue(value)}`);
    }
    if (value.length !== n.value) {
      return fail('INVALID_LENGTH', ctx.path, `Expected ${n.value} elements at '${ctx.path}', got ${value.length}`);
    }
    return readOk(value);
  }
}

function elementContext(ctx: CodecContext, index: number): CodecContext {
  return { path: `${ctx.path}[${index}]`, scope: ctx.scope };
}
