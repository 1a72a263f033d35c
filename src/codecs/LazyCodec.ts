import type { ByteReader } from '../ByteReader';
import type { ByteWriter } from '../ByteWriter';
import type { CodecContext, CodecResult, CodecStatus, FieldCodec, FieldValue } from './FieldCodec';

/**
 * A codec that resolves its target on first use. Lets struct fields name
 * structs declared later in the protocol.
 */
export class LazyCodec implements FieldCodec {
  readonly typeName: string;
  private _resolved: FieldCodec | null = null;
  private readonly _resolver: () => FieldCodec;

  constructor(typeName: string, resolver: () => FieldCodec) {
    this.typeName = typeName;
    this._resolver = resolver;
  }

  private get codec(): FieldCodec {
    if (!this._resolved) {
      this._resolved = this._resolver();
    }
    return this._resolved;
  }

  get defaultValue(): FieldValue | undefined {
    return this.codec.defaultValue;
  }

  decode(reader: ByteReader, ctx: CodecContext): CodecResult<FieldValue> {
    return this.codec.decode(reader, ctx);
  }

  encode(writer: ByteWriter, value: FieldValue | undefined, ctx: CodecContext): CodecStatus {
    return this.codec.encode(writer, value, ctx);
  }

  sizeOf(value: FieldValue | undefined, ctx: CodecContext): CodecResult<number> {
    return this.codec.sizeOf(value, ctx);
  }

  exportScope(name: string, value: FieldValue, scope: Map<string, number>): void {
    this.codec.exportScope?.(name, value, scope);
  }
}
