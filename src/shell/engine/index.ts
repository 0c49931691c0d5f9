export { createLdEngine, type LdEngineSettings } from "./ld-engine.js";
