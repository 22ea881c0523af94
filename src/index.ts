export * from "./common/index.js";
export {
  BasicTLVParser,
  DecodeContainer,
  Grammar,
  StatefulDecoder,
} from "./parser/index.js";
export type {
  CloserSpec,
  ConstructedFrame,
  DecodeOutcome,
  DecoderCallback,
  DecoderOptions,
  GrammarAction,
  GrammarDefinition,
  GrammarSeed,
  GrammarTransition,
  TransitionSpec,
} from "./parser/index.js";
export { BasicTLVBuilder, ByteWriter, integerLength } from "./builder/index.js";
export * from "./name/index.js";
export * from "./ldap/index.js";
