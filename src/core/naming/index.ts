export {
  ANNOTATION_PREFIX,
  ANNOTATIONS,
  LABELS,
  MANAGED_BY,
  type ManifestAnnotationOptions,
  type ManifestLabelOptions,
  manifestAnnotations,
  manifestLabels,
  REVISION_ANNOTATIONS,
  type SelectorLabels,
  selectorLabels,
  toLabelSelector,
} from './labels.js';
export {
  assertDistinctNames,
  DNS_LABEL_PATTERN,
  fullName,
  isDnsLabel,
  MAX_NAME_LENGTH,
  MAX_RELEASE_NAME_LENGTH,
  type NamedResource,
  validateNamespace,
  validateReleaseName,
} from './names.js';
