// Minimal delimited-text reader: quoted fields with "" escapes, CRLF or LF line endings,
// leading spaces after a delimiter skipped, UTF-8 BOM dropped.
export function parseDelimited(content: string, delimiter: string): string[][] {
  if (delimiter.length !== 1 || delimiter === '"' || delimiter === '\n' || delimiter === '\r') {
    throw new Error(`Unsupported delimiter: ${JSON.stringify(delimiter)}`);
  }

  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldStart = true;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char !== '"') {
        field += char;
      } else if (text[i + 1] === '"') {
        field += '"';
        i++;
      } else {
        inQuotes = false;
      }
      continue;
    }

    if (char === delimiter) {
      row.push(field);
      field = '';
      fieldStart = true;
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
      fieldStart = true;
    } else if (fieldStart && char === ' ') {
      // skip
    } else if (fieldStart && char === '"') {
      inQuotes = true;
      fieldStart = false;
    } else {
      field += char;
      fieldStart = false;
    }
  }

  if (!fieldStart || field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows;
}
