import type { ProcessAdapterFactory } from "../types.js";
import { createConptyAdapter } from "./conptyAdapter.js";
import { createPosixPtyAdapter } from "./posixPtyAdapter.js";

export { PosixPtyAdapter } from "./posixPtyAdapter.js";
export { ConptyAdapter } from "./conptyAdapter.js";

/** Bound once when the module loads; never re-chosen at call time. */
export const createProcessAdapter: ProcessAdapterFactory =
  process.platform === "win32" ? createConptyAdapter : createPosixPtyAdapter;
