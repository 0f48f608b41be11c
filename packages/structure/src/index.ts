export { findSwingPoints } from "./swingPoints";
export type { SwingPoints } from "./swingPoints";
export { findFairValueGaps } from "./fairValueGaps";
export { findOrderBlocks } from "./orderBlocks";
export { findLiquiditySweeps } from "./liquiditySweeps";
export type { LiquiditySweepFlags } from "./liquiditySweeps";
export { findRejections } from "./rejections";
export type { RejectionFlags, RejectionOptions } from "./rejections";
export { projectZones } from "./projection";
export { clusterSupportResistance, nearestZone } from "./supportResistance";
export type { ClusterOptions } from "./supportResistance";
export { analyzeStructure } from "./analyzeStructure";
export type { StructureAnalysis } from "./analyzeStructure";
