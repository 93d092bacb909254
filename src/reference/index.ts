export {
  parseImageReference,
  formatImageReference,
  repositoryName,
  isTagged,
  withTagOrDefault,
  pinReference,
  expandDefaultPlaceholder,
} from "./reference";
export type {
  ImageReference,
  TaggedImageReference,
  PinnedImageReference,
} from "./reference.types";
