import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { METADATA_DIR, METADATA_FILE_SUFFIX } from "../constants";
import { ListingError } from "../errors";

async function hasMetadataFiles(tableDir: string): Promise<boolean> {
  try {
    const names = await fs.readdir(path.join(tableDir, METADATA_DIR));
    return names.some((name) => name.endsWith(METADATA_FILE_SUFFIX));
  } catch {
    return false;
  }
}

/**
 * Names of the tables directly under a warehouse directory: sub-directories
 * whose `metadata/` holds at least one metadata file. Sorted by name.
 */
export async function discoverTables(warehousePath: string): Promise<string[]> {
  const root = path.resolve(warehousePath);
  let entries: Dirent[];
  try {
    entries = await fs.readdir(root, { withFileTypes: true });
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ListingError(`Warehouse directory is not accessible: ${reason}`, null, root);
  }

  const tables: string[] = [];
  for (const entry of entries) {
    if (entry.isDirectory() && (await hasMetadataFiles(path.join(root, entry.name)))) {
      tables.push(entry.name);
    }
  }
  return tables.sort();
}
