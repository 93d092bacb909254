export {
  safeParseYaml,
  safeParseYamlDocument,
  formatZodIssues,
} from "./friendly-errors";
export type { FriendlyError, ParseErrorType, ParseResult } from "./friendly-errors";
