export {
  parseAppDescriptor,
  loadAppDescriptor,
  serializeAppDescriptor,
} from "./descriptor";
