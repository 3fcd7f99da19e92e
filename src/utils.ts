import chalk from 'chalk';
import type { BoardEnvelope, PlankaCard, PlankaList } from './planka-client.js';

// ============================================
// BOARD GROUPING
// ============================================

export interface BoardColumn {
  list: PlankaList;
  cards: PlankaCard[];
}

// Array#sort is stable, so equal positions keep the server's order
export function sortByPosition<T extends { position?: number | null }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => (a.position ?? 0) - (b.position ?? 0));
}

export function groupBoard(envelope: BoardEnvelope): BoardColumn[] {
  const lists = envelope.included?.lists ?? [];
  const cards = envelope.included?.cards ?? [];

  return sortByPosition(lists).map((list) => ({
    list,
    cards: sortByPosition(cards.filter((card) => card.listId === list.id)),
  }));
}

// ============================================
// TEXT HELPERS
// ============================================

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  if (maxLength <= 1) return text.slice(0, maxLength);
  return text.slice(0, maxLength - 1) + '…';
}

export function display(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

// ============================================
// TABLES
// ============================================

export interface TableColumn {
  header: string;
  maxWidth?: number;
  style?: (text: string) => string;
}

export function renderTable(title: string, columns: TableColumn[], rows: unknown[][]): string {
  const cells = rows.map((row) =>
    columns.map((column, i) => {
      const text = display(row[i]).replace(/\s+/g, ' ');
      return column.maxWidth ? truncate(text, column.maxWidth) : text;
    })
  );

  const widths = columns.map((column, i) =>
    Math.max(column.header.length, ...cells.map((row) => row[i].length))
  );

  const line = (values: string[], styles: Array<((text: string) => string) | undefined>) =>
    values
      .map((value, i) => {
        const padded = i === values.length - 1 ? value : value.padEnd(widths[i]);
        const style = styles[i];
        return style ? style(padded) : padded;
      })
      .join('  ')
      .trimEnd();

  const lines = [
    chalk.bold(title),
    line(columns.map((c) => c.header), columns.map(() => chalk.bold)),
    chalk.dim(widths.map((w) => '─'.repeat(w)).join('  ')),
    ...cells.map((row) => line(row, columns.map((c) => c.style))),
  ];

  return lines.join('\n');
}
