// @cogwatch/rationale-kernel
// Entry point exports for the rationale rule engine.

export * from "./explain";
export * from "./inputs/field_map";
export * from "./ruleset/validate";
export * from "./templates/condition_engine";
export * from "./templates/text_template";
