// CHANGE: Barrel for SHELL configuration
// PURITY: SHELL

export {
	LOG_LEVEL_KEY,
	type MatcherConfig,
	matcherConfig,
	TRACE_KEY,
	withMatcherLogging,
} from "./settings.js";
