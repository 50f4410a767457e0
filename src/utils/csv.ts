/**
 * Converte linhas (objetos) em texto CSV, com aspas onde necessário.
 */
export function toCsv(rows: Record<string, unknown>[], columns: string[]): string {
  const escape = (val: unknown) => {
    if (val === null || val === undefined) return '';
    const str = String(val);
    // Escape values containing commas, quotes, or newlines
    if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
      return `"${str.replace(/"/g, '""')}"`;
    }
    return str;
  };

  const header = columns.map(escape).join(',');
  const body = rows.map((row) => columns.map((col) => escape(row[col])).join(','));
  return [header, ...body].join('\n') + '\n';
}
