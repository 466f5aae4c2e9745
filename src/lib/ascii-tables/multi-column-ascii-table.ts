import stringWidth from 'string-width';
import { ASCIITableUtils } from './ascii-table-utils';
import { EOL } from '../constants';

export interface MultiColumnASCIITableOptions {
  /** Maximum rendered width including borders (default: 100) */
  tableWidth?: number;
  /** Shown in a single row spanning the table when there are no rows */
  emptyMessage?: string;
}

const MIN_COLUMN_WIDTH = 3;

/**
 * Renders rows under a header, sizing each column to its widest cell.
 * When the content is wider than `tableWidth`, the widest columns are narrowed
 * first and their cells wrap onto extra lines.
 *
 * ```
 * +================+
 * | NAME | STATE   |
 * +----------------+
 * | db   | running |
 * +================+
 * ```
 */
export class MultiColumnASCIITable {
  private headers: string[];
  private rows: string[][];
  private tableWidth: number;
  private emptyMessage: string;

  constructor(headers: string[], options: MultiColumnASCIITableOptions = {}) {
    this.headers = headers;
    this.rows = [];
    this.tableWidth = options.tableWidth ?? 100;
    this.emptyMessage = options.emptyMessage ?? '';

    const minTableWidth = this.getMinimumWidth();

    if (this.tableWidth < minTableWidth) {
      throw new Error(
        `Table width must be at least ${minTableWidth} to accommodate the headers.`,
      );
    }
  }

  public getMinimumWidth(): number {
    return this.headers.length * (MIN_COLUMN_WIDTH + 3) + 1;
  }

  public get rowCount(): number {
    return this.rows.length;
  }

  public addRow(row: string[]): void {
    if (row.length !== this.headers.length) {
      throw new Error(
        `Number of values in the row (${row.length}) must match the number of headers (${this.headers.length}).`,
      );
    }

    this.rows.push(row);
  }

  public toString(): string {
    const columnWidths = this.calculateColumnWidths();
    const outerSeparator = ASCIITableUtils.createSeparator(columnWidths);
    const headerSeparator = ASCIITableUtils.createSeparator(columnWidths, '-');

    const lines = [
      outerSeparator,
      ...this.renderRow(this.headers, columnWidths),
      headerSeparator,
    ];

    if (this.rows.length === 0) {
      // One cell spanning every column: inner width is the row width minus '| ' and ' |'
      const innerWidth =
        columnWidths.reduce((sum, width) => sum + width + 3, 0) - 3;

      for (const line of ASCIITableUtils.wrapText(
        this.emptyMessage,
        innerWidth,
      )) {
        lines.push(`| ${ASCIITableUtils.padDisplayRight(line, innerWidth)} |`);
      }
    } else {
      for (const row of this.rows) {
        lines.push(...this.renderRow(row, columnWidths));
      }
    }

    lines.push(outerSeparator);

    return lines.join(EOL);
  }

  public calculateColumnWidths(): number[] {
    const widths = this.headers.map((header, index) =>
      Math.max(
        stringWidth(header),
        MIN_COLUMN_WIDTH,
        ...this.rows.map((row) => stringWidth(row[index] ?? '')),
      ),
    );

    // Each column costs its width plus ' | ', and the row adds one final border
    const totalWidth = (): number =>
      widths.reduce((sum, width) => sum + width + 3, 0) + 1;

    while (totalWidth() > this.tableWidth) {
      const widest = Math.max(...widths);

      if (widest <= MIN_COLUMN_WIDTH) {
        break;
      }

      widths[widths.indexOf(widest)] = widest - 1;
    }

    return widths;
  }

  private renderRow(row: string[], columnWidths: number[]): string[] {
    const wrappedCells = row.map((value, index) =>
      ASCIITableUtils.wrapText(value, columnWidths[index] ?? MIN_COLUMN_WIDTH),
    );

    const lineCount = Math.max(...wrappedCells.map((cell) => cell.length));
    const lines: string[] = [];

    for (let i = 0; i < lineCount; i++) {
      const cells = wrappedCells.map((cell, index) => {
        const width = columnWidths[index] ?? MIN_COLUMN_WIDTH;
        return ' ' + ASCIITableUtils.padDisplayRight(cell[i] ?? '', width) + ' ';
      });

      lines.push('|' + cells.join('|') + '|');
    }

    return lines;
  }
}
