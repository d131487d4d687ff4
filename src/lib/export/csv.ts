import ExcelJS from "exceljs";

import type { ExportRow } from "./rows.ts";

/** Writes rows as CSV, one column per key of the first row. */
export async function writeCsv(
  rows: ExportRow[],
  filePath: string
): Promise<{ filePath: string; recordsExported: number }> {
  if (rows.length === 0) {
    return { filePath, recordsExported: 0 };
  }

  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet("Export");

  worksheet.columns = Object.keys(rows[0]).map((key) => ({
    header: key,
    key,
  }));

  for (const row of rows) {
    worksheet.addRow(row);
  }

  await workbook.csv.writeFile(filePath);
  return { filePath, recordsExported: rows.length };
}
