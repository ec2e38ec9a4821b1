/**
 * Workbooks become one page per worksheet. Each sheet is a rectangle of
 * display strings; empty cells are "".
 */

import { Readable } from "node:stream";
import ExcelJS from "exceljs";
import { MalformedSourceError, errorMessage } from "../errors.js";
import type { OfficeBlock } from "../pipeline/core/schemas.js";

export async function parseXlsx(bytes: Buffer, documentId: string): Promise<OfficeBlock[][]> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.read(Readable.from(bytes));
  } catch (err) {
    throw new MalformedSourceError(
      `${documentId}: not a readable workbook: ${errorMessage(err)}`,
      documentId,
      { cause: err }
    );
  }

  return workbook.worksheets.map((sheet) => {
    const rows: string[][] = [];
    const columns = sheet.columnCount;
    for (let r = 1; r <= sheet.rowCount; r++) {
      const row = sheet.getRow(r);
      const cells: string[] = [];
      for (let c = 1; c <= columns; c++) {
        cells.push(row.getCell(c).text);
      }
      rows.push(cells);
    }
    return [{ type: "sheet", name: sheet.name, rows }];
  });
}
