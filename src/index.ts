export * from "./activity";
export * from "./calendar";
export * from "./config";
export * from "./coordinator";
export * from "./debug";
export * from "./decider";
export * from "./default-status";
export * from "./engine";
export * from "./errors";
export * from "./logger";
export * from "./result";
export * from "./storage";
export * from "./types/collaborators";
export * from "./types/prompt";
export { SerialQueue } from "./utils/serial-queue";
