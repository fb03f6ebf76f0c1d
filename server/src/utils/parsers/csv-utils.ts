/**
 * Shared CSV parsing utilities for the local session-export reader.
 */

/**
 * Parse a CSV string into rows. Handles quoted fields and CRLF.
 * Returns [headers, ...dataRows] where each row is a string array.
 */
export function parseCSV(text: string): string[][] {
  const clean = text.replace(/^\uFEFF/, "");
  const rows: string[][] = [];
  let current: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < clean.length; i++) {
    const ch = clean[i];
    const next = clean[i + 1];

    if (inQuotes) {
      if (ch === '"' && next === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        field += ch;
      }
    } else {
      if (ch === '"') {
        inQuotes = true;
      } else if (ch === ",") {
        current.push(field.trim());
        field = "";
      } else if (ch === "\n" || (ch === "\r" && next === "\n")) {
        current.push(field.trim());
        field = "";
        if (current.length > 1 || current[0] !== "") {
          rows.push(current);
        }
        current = [];
        if (ch === "\r") i++;
      } else {
        field += ch;
      }
    }
  }

  current.push(field.trim());
  if (current.length > 1 || current[0] !== "") {
    rows.push(current);
  }

  return rows;
}

/**
 * Map header names to column indices, case-insensitive and trimmed.
 */
export function mapHeaders(headers: string[]): Map<string, number> {
  const map = new Map<string, number>();
  for (let i = 0; i < headers.length; i++) {
    map.set(headers[i].trim().toLowerCase(), i);
  }
  return map;
}

/**
 * Get a column value from a row by header name (case-insensitive).
 */
export function col(row: string[], hdr: Map<string, number>, name: string): string {
  const idx = hdr.get(name.toLowerCase());
  if (idx === undefined || idx >= row.length) return "";
  return row[idx].trim();
}

/**
 * Numeric column value, or null when the cell is empty, "NaN"/"NaT" or unparseable.
 */
export function numCol(row: string[], hdr: Map<string, number>, name: string): number | null {
  const raw = col(row, hdr, name);
  if (raw === "" || /^(nan|nat|none|null)$/i.test(raw)) return null;
  const val = Number(raw);
  return Number.isFinite(val) ? val : null;
}

/**
 * Boolean column value: "True"/"1"/"yes" → true, "False"/"0"/"no" → false, else null.
 */
export function boolCol(row: string[], hdr: Map<string, number>, name: string): boolean | null {
  const raw = col(row, hdr, name).toLowerCase();
  if (raw === "true" || raw === "1" || raw === "1.0" || raw === "yes") return true;
  if (raw === "false" || raw === "0" || raw === "0.0" || raw === "no") return false;
  return null;
}

/**
 * Parse a duration into seconds. Accepts "M:SS.mmm", "H:MM:SS.mmm", "SS.mmm" and
 * timedelta strings like "0 days 00:01:35.123000". Returns null for empty/NaT cells.
 */
export function parseDuration(value: string): number | null {
  if (!value || value.trim() === "") return null;
  let clean = value.trim();
  if (/^(nat|nan)$/i.test(clean)) return null;

  let days = 0;
  const dayMatch = /^(-?\d+)\s+days?\s+(.*)$/i.exec(clean);
  if (dayMatch) {
    days = parseInt(dayMatch[1], 10);
    clean = dayMatch[2];
  }

  const parts = clean.split(":");
  let seconds: number;
  if (parts.length === 3) {
    // H:MM:SS.mmm
    const h = parseFloat(parts[0]);
    const m = parseFloat(parts[1]);
    const s = parseFloat(parts[2]);
    if (isNaN(h) || isNaN(m) || isNaN(s)) return null;
    seconds = h * 3600 + m * 60 + s;
  } else if (parts.length === 2) {
    // M:SS.mmm
    const m = parseFloat(parts[0]);
    const s = parseFloat(parts[1]);
    if (isNaN(m) || isNaN(s)) return null;
    seconds = m * 60 + s;
  } else {
    // SS.mmm
    const val = Number(clean);
    if (!Number.isFinite(val)) return null;
    seconds = val;
  }

  return days * 86400 + seconds;
}
