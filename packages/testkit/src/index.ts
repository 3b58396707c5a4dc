export { createTempStoreRoot, removeDir, withTempStore, withTempDir } from "./fs.js";
export { FaultInjectingStore } from "./faults.js";
export type { CallRecord, FetchFault, StoreFault } from "./faults.js";
export { inspectPackageBuild } from "./packaging.js";
export type { EntryPoint, PackageBuild } from "./packaging.js";
