export { ProtocolBuilder } from './ProtocolBuilder';
export type { TypeKind } from './ProtocolBuilder';
export { ProtocolCodec } from './ProtocolCodec';
export { parseProtocol, loadProtocolFile, loadProtocolsFromDir } from './ProtocolLoader';
export { toJSONValue } from './render';
export type { JSONValue } from './render';
export { ProtocolDocumentSchema, parseIntegerLiteral } from './definition';
export type {
  ProtocolDocument,
  StructDefinition,
  FieldDefinition,
  EnumDefinition,
  EnumValueDefinition,
  BitDefinition,
  IntegerTypeName,
} from './definition';
