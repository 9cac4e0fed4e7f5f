export * from "./bit-codec";
