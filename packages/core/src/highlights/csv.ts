/**
 * Comma-separated values reader (RFC 4180 quoting).
 *
 * "a,b"        -> ["a", "b"]
 * "\"x, y\",z" -> ["x, y", "z"]
 * "\"say \"\"hi\"\"\"" -> ["say \"hi\""]
 */

/**
 * Split CSV text into rows of fields. Quoted fields may contain commas,
 * doubled quotes and line breaks. Blank lines are skipped.
 */
export function parseCSV(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;

  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  const endRow = () => {
    row.push(field);
    if (row.length > 1 || row[0] !== "") rows.push(row);
    row = [];
    field = "";
  };

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (inQuotes) {
      if (char === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ",") {
      row.push(field);
      field = "";
    } else if (char === "\n") {
      endRow();
    } else if (char === "\r") {
      if (input[i + 1] === "\n") i++;
      endRow();
    } else {
      field += char;
    }
  }

  if (field !== "" || row.length > 0) endRow();
  return rows;
}

/**
 * Parse CSV with a header row into records keyed by column name.
 * Missing trailing fields read as "".
 */
export function parseCSVRecords(text: string): { header: string[]; records: Record<string, string>[] } {
  const [headerRow, ...dataRows] = parseCSV(text);
  if (!headerRow) return { header: [], records: [] };

  const header = headerRow.map((h) => h.trim());
  const records = dataRows.map((fields) => {
    const record: Record<string, string> = {};
    header.forEach((name, i) => {
      record[name] = fields[i] ?? "";
    });
    return record;
  });

  return { header, records };
}
