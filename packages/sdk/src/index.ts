export * from "./errors.js";
export * from "./logging/logger.js";
export * from "./config/dataDictionary.js";

export * from "./codec/byteSource.js";
export * from "./codec/eventMatrix.js";
export * from "./codec/decode.js";
export * from "./codec/readEventFile.js";

export * from "./naming/timestamp.js";
export * from "./naming/filename.js";
export * from "./naming/identity.js";

export * from "./fileset/fileSet.js";
export * from "./fileset/checkFiles.js";
export * from "./fileset/discovery.js";
