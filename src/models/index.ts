export * from "./BuildPipeline";
export * from "./Env";
export * from "./FactoryRegistry";
export * from "./LogPrinter";
export * from "./Logger";
