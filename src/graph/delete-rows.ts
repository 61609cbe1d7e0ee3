import { DELETE_FILE_PATH_COLUMN, DELETE_POSITION_COLUMN } from "../constants";
import type { SampleRow } from "../models/collaborators";

/** Target data-file path of a delete row, when it carries one. */
export function deleteTargetPath(cells: SampleRow): string | null {
  const value = cells[DELETE_FILE_PATH_COLUMN];
  return typeof value === "string" && value.trim().length > 0 ? value : null;
}

/** Row position of a position-delete row as a non-negative integer. */
export function deletePosition(cells: SampleRow): number | null {
  const value = cells[DELETE_POSITION_COLUMN];
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= 0 ? value : null;
  }
  if (typeof value === "bigint") {
    return value >= 0n && value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : null;
  }
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    const parsed = Number.parseInt(value.trim(), 10);
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}
