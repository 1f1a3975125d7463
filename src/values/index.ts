export * from "./format";
export * from "./quantity";
export * from "./prosody";
export * from "./language";
export * from "./audio";
export * from "./keywords";
export * from "./voice";
