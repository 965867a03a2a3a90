import { createArrayCsvStringifier } from 'csv-writer';
import type { ReviewTable, TableCell } from '@shared/types';

const FIELD_DELIMITER = ',';
const RECORD_DELIMITER = '\n';

// csv-writer quotes on a comma, a quote or \n but not on a bare \r
const minimalQuoting = createArrayCsvStringifier({
  fieldDelimiter: FIELD_DELIMITER,
  recordDelimiter: RECORD_DELIMITER
});
const forcedQuoting = createArrayCsvStringifier({
  fieldDelimiter: FIELD_DELIMITER,
  recordDelimiter: RECORD_DELIMITER,
  alwaysQuote: true
});

const hasCarriageReturn = (cell: TableCell): boolean => typeof cell === 'string' && cell.includes('\r');

function stringifyField(cell: TableCell): string {
  const stringifier = hasCarriageReturn(cell) ? forcedQuoting : minimalQuoting;
  return stringifier.stringifyRecords([[cell]]).slice(0, -RECORD_DELIMITER.length);
}

function stringifyRow(row: TableCell[]): string {
  if (!row.some(hasCarriageReturn)) {
    return minimalQuoting.stringifyRecords([row]);
  }
  return row.map(stringifyField).join(FIELD_DELIMITER) + RECORD_DELIMITER;
}

// Quotes only fields holding a comma, a quote or a line break; null cells stay empty
export function tableToCsv(table: ReviewTable): string {
  return table.map(stringifyRow).join('');
}
