import path from "path";

export function normalizeText(s: string): string {
    return s
      .replace(/\r\n/g, "\n")
      .replace(/\t/g, "  ")
      .replace(/[ \u00A0]+/g, " ")
      .replace(/\n{3,}/g, "\n\n")
      .trim();
  }

/** Lower-cased extension without the dot ("Contrato.PDF" -> "pdf"). */
export function fileExtension(filePath: string): string {
    return path.extname(filePath).slice(1).toLowerCase();
}
