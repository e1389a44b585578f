export { CliFlagError } from "./errors";
export { parseCliFlags } from "./flags";
export { renderCliHelp } from "./help";
export { redactCliParameters, redactResolvedSettings } from "./redaction";
