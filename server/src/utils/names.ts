/** Case- and accent-insensitive form of a name: "São Paulo" → "sao paulo" */
export function foldName(name: string): string {
  return name
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .trim()
    .toLowerCase();
}
