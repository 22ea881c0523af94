import { createLdapMessageDecoder, fromHex, resultCodeName } from "../src/index.js";

// Two SearchResultDone PDUs, delivered in three arbitrary chunks.
const wire = fromHex(
  "300c02010165070a010004000400" + "300c02010265070a012004000400",
);
const decoder = createLdapMessageDecoder();
decoder.setCallback((message) => {
  const op = message.protocolOp;
  if ("resultCode" in op) {
    console.log(message.messageID, resultCodeName(op.resultCode));
  }
});
decoder.decode(wire.subarray(0, 5));
decoder.decode(wire.subarray(5, 17));
decoder.decode(wire.subarray(17));
decoder.flush();
// 1 success
// 2 noSuchObject
