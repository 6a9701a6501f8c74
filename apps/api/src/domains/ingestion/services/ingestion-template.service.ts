import {
  TEMPLATE_COLUMNS,
  TEMPLATE_EXAMPLE_ROW,
} from '@carelytics/shared/constants/ingestion.constants.js';

function escapeCsvValue(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Upload template: the header row followed by one example visit.
 */
export function buildTemplateCsv(): string {
  const header = TEMPLATE_COLUMNS.join(',');
  const example = TEMPLATE_COLUMNS.map((column) =>
    escapeCsvValue(TEMPLATE_EXAMPLE_ROW[column]),
  ).join(',');
  return `${header}\n${example}\n`;
}
