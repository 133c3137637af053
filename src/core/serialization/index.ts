/**
 * Serialization module exports
 */

export {
  manifestToYaml,
  serializeManifests,
  valuesToYaml,
  type YamlSerializationOptions,
} from './yaml.js';
