export * from "./logger";
export * from "./common/enums";
