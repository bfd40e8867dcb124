export type VariantType = "SNP" | "MNP" | "INDEL" | "MIXED" | "SYMBOLIC" | "NO_VARIATION";

export interface VcfRecord {
  chrom: string;
  pos: number;
  id: string;
  ref: string;
  alt: string[];
  qual: string;
  filter: string;
  info: string;
  // FORMAT and sample columns, untouched.
  samples: string[];
}

export interface VcfFile {
  // Meta lines and the #CHROM line, in file order.
  header: string[];
  records: VcfRecord[];
}

export const NON_REF = "<NON_REF>";

export function parseVcf(text: string): VcfFile {
  const header: string[] = [];
  const records: VcfRecord[] = [];

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trimEnd();
    if (!line) continue;
    if (line.startsWith("#")) {
      header.push(line);
      continue;
    }

    const cols = line.split("\t");
    if (cols.length < 8) throw new Error(`malformed VCF record (${cols.length} columns): ${line.slice(0, 80)}`);
    const [chrom, pos, id, ref, alt, qual, filter, info, ...samples] = cols;
    const position = Number.parseInt(pos ?? "", 10);
    if (!chrom || !ref || !Number.isInteger(position)) throw new Error(`malformed VCF record: ${line.slice(0, 80)}`);

    records.push({
      chrom,
      pos: position,
      id: id ?? ".",
      ref,
      alt: alt && alt !== "." ? alt.split(",") : [],
      qual: qual ?? ".",
      filter: filter ?? ".",
      info: info ?? ".",
      samples
    });
  }

  return { header, records };
}

export function formatRecord(r: VcfRecord): string {
  const alt = r.alt.length ? r.alt.join(",") : ".";
  return [r.chrom, String(r.pos), r.id, r.ref, alt, r.qual, r.filter, r.info, ...r.samples].join("\t");
}

export function formatVcf(file: VcfFile): string {
  const lines = [...file.header, ...file.records.map(formatRecord)];
  return lines.join("\n") + "\n";
}

export function variantType(r: VcfRecord): VariantType {
  const alts = r.alt.filter((a) => a !== NON_REF && a !== "*");
  if (!alts.length) return "NO_VARIATION";
  if (alts.some((a) => a.startsWith("<") || a.includes("[") || a.includes("]"))) return "SYMBOLIC";

  const kinds = new Set<VariantType>();
  for (const a of alts) {
    if (a.length === r.ref.length) kinds.add(a.length === 1 ? "SNP" : "MNP");
    else kinds.add("INDEL");
  }
  if (kinds.size > 1) return "MIXED";
  const [only] = kinds;
  return only ?? "NO_VARIATION";
}

/** Appends a `key=value` (or flag) entry to an INFO column. */
export function appendInfo(info: string, entry: string): string {
  return info === "." || info === "" ? entry : `${info};${entry}`;
}

export function infoValue(info: string, key: string): string | null {
  for (const part of info.split(";")) {
    const eq = part.indexOf("=");
    if (eq === -1) {
      if (part === key) return "";
      continue;
    }
    if (part.slice(0, eq) === key) return part.slice(eq + 1);
  }
  return null;
}
