export * from "./types";
export * from "./constants";
export * from "./clock";
export * from "./aggregation/capped-reservoir";
export * from "./aggregation/profile-key";
export * from "./aggregation/behavior-profile";
export * from "./aggregation/name-resolver";
export * from "./aggregation/snapshot";
export * from "./aggregation/behavior-aggregator";
export * from "./classifier/classification-cache";
export * from "./classifier/entity-classifier";
export * from "./spatial/spatial-occupancy-tracker";
export * from "./damage/damage-observation-tracker";
export * from "./persistence/snapshot-writer";
export * from "./session/report";
export * from "./session/commands";
export * from "./session/action-collector";
