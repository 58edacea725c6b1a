export {
  emitJson,
  emitModule,
  loadProgram,
  toDocument,
  PROGRAM_FORMAT,
  PROGRAM_FORMAT_VERSION,
  type ProgramDocument,
} from "./program-json.js";
export { ProgramFormatError } from "./errors.js";
