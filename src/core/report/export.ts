/**
 * Flat export of the week's dishes (JSON or CSV)
 */

import { stringify } from "csv-stringify/sync";
import { promises as fs } from "fs";
import path from "node:path";
import { ConfigError } from "../errors";
import type { MenuItem } from "../types/index";

export interface ExportRow {
  day: string;
  name: string;
  scraped_at: string;
}

export const EXPORT_COLUMNS = ["day", "name", "scraped_at"] as const;

export const toExportRows = (
  items: readonly MenuItem[],
  scrapedAt: string,
): ExportRow[] => items.map((i) => ({ day: i.day, name: i.name, scraped_at: scrapedAt }));

/**
 * Serializes rows; CSV always carries the header, even without rows
 */
export function serializeRows(rows: readonly ExportRow[], format: string): string {
  switch (format) {
    case "json":
      return `${JSON.stringify(rows, null, 2)}\n`;
    case "csv":
      return stringify([...rows], { header: true, columns: [...EXPORT_COLUMNS] });
    default:
      throw new ConfigError(
        `Unsupported export format '${format}'`,
        "Use EXPORT_FORMAT=json or EXPORT_FORMAT=csv",
      );
  }
}

/**
 * Writes <basePath>.<format> and returns its path
 */
export async function exportItems(
  items: readonly MenuItem[],
  format: string,
  basePath: string,
  scrapedAt: string,
): Promise<string> {
  const body = serializeRows(toExportRows(items, scrapedAt), format);
  const filePath = `${basePath}.${format}`;
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, body, "utf8");
  return filePath;
}
