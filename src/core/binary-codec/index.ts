export * from "./binary-codec";
export { toHalfBits, fromHalfBits, roundToHalf } from "./half-float";
