export { parseProgram, serializeProgram, programId } from "./adapter.js";
