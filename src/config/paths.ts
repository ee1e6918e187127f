import path from "node:path";
import { fileURLToPath } from "node:url";

const modulePath = fileURLToPath(import.meta.url);
const moduleDir = path.dirname(modulePath);

// ".ts" when loaded from sources through tsx or vitest, ".js" once built.
const moduleExtension = path.extname(modulePath);

export const projectRoot = path.resolve(moduleDir, "..", "..");
export const dataRoot = path.resolve(projectRoot, "data");
export const fallbackCsvPath = path.resolve(dataRoot, "stocks_data.csv");
export const workerEntryPath = path.resolve(
  moduleDir,
  "..",
  "worker",
  `main${moduleExtension}`,
);
export const runningFromSources = moduleExtension === ".ts";
