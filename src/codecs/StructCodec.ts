import type { ByteReader } from '../ByteReader';
import type { ByteWriter } from '../ByteWriter';
import { SUCCESS, readOk } from '../Status';
import { Expression, isSatisfied } from '../expression';
import {
  CodecContext,
  CodecResult,
  CodecStatus,
  FieldCodec,
  FieldValue,
  StructValue,
  describeValue,
  fail,
  isStructValue,
  outOfRange,
} from './FieldCodec';

export interface StructField {
  kind: 'field';
  name: string;
  codec: FieldCodec;
  /** Field is present only when this evaluates to non-zero. */
  condition?: Expression;
}

/** Bytes skipped on decode and left untouched on encode. */
export interface StructPadding {
  kind: 'padding';
  name: string;
  size: number;
}

export type StructMember = StructField | StructPadding;

function memberPath(ctx: CodecContext, name: string): string {
  return ctx.path ? `${ctx.path}.${name}` : name;
}

/**
 * A record of members read and written in declaration order.
 *
 * Each struct evaluates lengths and conditions in its own scope, holding
 * the numeric values of its earlier fields. Processing stops at the first
 * failing member; the reader or writer is left where that member failed.
 */
export class StructCodec implements FieldCodec {
  readonly typeName: string;
  readonly members: readonly StructMember[];

  constructor(name: string, members: readonly StructMember[]) {
    this.typeName = name;
    this.members = members;
  }

  decode(reader: ByteReader, ctx: CodecContext): CodecResult<StructValue> {
    const scope = new Map<string, number>();
    const result: StructValue = {};

    for (const member of this.members) {
      const path = memberPath(ctx, member.name);
      if (member.kind === 'padding') {
        if (!reader.skip(member.size).ok) {
          return outOfRange({ path, scope }, 'decode', 'padding');
        }
        continue;
      }
      if (member.condition && !isSatisfied(member.condition, scope)) continue;

      const r = member.codec.decode(reader, { path, scope });
      if (!r.ok) return r;
      result[member.name] = r.value;
      member.codec.exportScope?.(member.name, r.value, scope);
    }

    return readOk(result);
  }

  encode(writer: ByteWriter, value: FieldValue | undefined, ctx: CodecContext): CodecStatus {
    if (!isStructValue(value)) {
      return fail('INVALID_VALUE', ctx.path, `Expected an object for ${this.typeName} at '${ctx.path || '<root>'}', got ${describeValue(value)}`);
    }
    const scope = new Map<string, number>();

    for (const member of this.members) {
      const path = memberPath(ctx, member.name);
      if (member.kind === 'padding') {
        if (!writer.skip(member.size).ok) {
          return outOfRange({ path, scope }, 'encode', 'padding');
        }
        continue;
      }
      if (member.condition && !isSatisfied(member.condition, scope)) continue;

      const fieldValue = fieldValueOf(value, member);
      const status = member.codec.encode(writer, fieldValue, { path, scope });
      if (!status.ok) return status;
      if (fieldValue !== undefined) {
        member.codec.exportScope?.(member.name, fieldValue, scope);
      }
    }

    return SUCCESS;
  }

  sizeOf(value: FieldValue | undefined, ctx: CodecContext): CodecResult<number> {
    if (!isStructValue(value)) {
      return fail('INVALID_VALUE', ctx.path, `Expected an object for ${this.typeName} at '${ctx.path || '<root>'}', got ${describeValue(value)}`);
    }
    const scope = new Map<string, number>();
    let total = 0;

    for (const member of this.members) {
      if (member.kind === 'padding') {
        total += member.size;
        continue;
      }
      if (member.condition && !isSatisfied(member.condition, scope)) continue;

      const fieldValue = fieldValueOf(value, member);
      const size = member.codec.sizeOf(fieldValue, { path: memberPath(ctx, member.name), scope });
      if (!size.ok) return size;
      total += size.value;
      if (fieldValue !== undefined) {
        member.codec.exportScope?.(member.name, fieldValue, scope);
      }
    }

    return readOk(total);
  }
}

function fieldValueOf(value: StructValue, field: StructField): FieldValue | undefined {
  return Object.prototype.hasOwnProperty.call(value, field.name)
    ? value[field.name]
    : field.codec.defaultValue;
}
