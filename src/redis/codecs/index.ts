export { createJsonCodec, serializeJson, deserializeJson } from './json-codec.js';
export { stringCodec, numberCodec, decimalCodec } from './primitive-codecs.js';
