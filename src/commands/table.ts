/**
 * Plain-text column table
 */

/**
 * Columns padded to their widest cell, a dashed rule under the headers
 */
export function formatTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const widths = headers.map((header, col) =>
    Math.max(header.length, ...rows.map(row => (row[col] ?? '').length))
  );

  const renderRow = (cells: readonly string[]): string =>
    widths
      .map((width, col) => (cells[col] ?? '').padEnd(width))
      .join('  ')
      .trimEnd();

  return [
    renderRow(headers),
    renderRow(widths.map(width => '-'.repeat(width))),
    ...rows.map(renderRow),
  ].join('\n');
}
