export * from "./schema/sample_v1";
export * from "./schema/state_set_v1";
export * from "./schema/feature_config_v1";
export * from "./schema/feature_vector_v1";
export * from "./schema/classifier_artifact_v1";
export * from "./schema/prediction_v1";
export * from "./schema/rationale_rules_v1";
export * from "./schema/playback_v1";
export * from "./schema/snapshot_v1";
export * from "./schema/engine_config_v1";
