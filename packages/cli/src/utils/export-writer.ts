import fs from "fs-extra";
import { resolve } from "path";
import type { ExportPayload } from "@cdn-ledger/core";

export const DEFAULT_EXPORT_PATH = "cdn_export.json";

/**
 * Write an export payload as indented JSON, creating parent directories.
 * Returns the absolute path written.
 */
export async function writeExport(outputPath: string, payload: ExportPayload): Promise<string> {
  const target = resolve(outputPath);
  await fs.outputJson(target, payload, { spaces: 2 });
  return target;
}
