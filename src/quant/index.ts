/**
 * Quant Engine — barrel export
 */

export * from "./realized-vol.js";
export * from "./atm.js";
export * from "./scoring.js";
