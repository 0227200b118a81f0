export {
  Serializer,
  JsonConverter,
  type JsonConverterClass,
  type JsonValue,
} from './serializer.js';
