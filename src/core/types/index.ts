// CHANGE: Central export file for all core type definitions
// PURITY: CORE

export type { EngineSettings, LinkEngine } from "./engine.js";
export type {
	DriverConfig,
	LinkConfiguration,
	OutputKind,
	OutputResolution,
} from "./link.js";
export type {
	LinkOptions,
	ParsedCommand,
	PositionedValue,
} from "./options.js";
export type {
	InputItem,
	NameSpecInput,
	ObjectFileInput,
	OrderedInputPlan,
} from "./plan.js";
