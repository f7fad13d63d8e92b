/**
 * pptmp4 Types Package
 */

export * from "./constants";
export type * from "./types";
