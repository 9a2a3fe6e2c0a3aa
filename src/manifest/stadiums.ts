import fs from "fs/promises";
import path from "path";
import type { ScheduleGameRecord } from "../types";
import { generateSlug } from "../utils/slug";

export const IMAGE_EXTENSIONS = [".jpg", ".png", ".webp"] as const;

export interface ParsedLocation {
  city: string | null;
  stadium: string | null;
  slug: string;
}

export interface StadiumEntry {
  slug: string;
  location_raw: string;
  city: string | null;
  stadium: string | null;
  example_game: string | null;
  files_present: string[];
  suggested_filenames: string[];
}

export interface StadiumManifest {
  generated_from: string;
  stadium_dir: string;
  found: StadiumEntry[];
  missing: StadiumEntry[];
  notes: {
    naming_rule: string;
    slug_source: string;
    slug_rules: string;
  };
}

/** Splits "Lincoln, Neb. / Memorial Stadium" into city and stadium. */
export function parseLocation(location: string): ParsedLocation | null {
  if (!location.trim()) return null;

  const [city, stadium] = location.split("/").map((part) => part.trim());
  const base = stadium ? `${stadium}-${city}` : city || location;
  const slug = generateSlug(base);
  if (!slug) return null;

  return { city: city || null, stadium: stadium || null, slug };
}

/** One entry per distinct stadium, the first game at it as the example. */
export function collectStadiums(games: readonly ScheduleGameRecord[]): StadiumEntry[] {
  const bySlug = new Map<string, StadiumEntry>();

  for (const game of games) {
    const parsed = parseLocation(game.location);
    if (!parsed || bySlug.has(parsed.slug)) continue;

    bySlug.set(parsed.slug, {
      slug: parsed.slug,
      location_raw: game.location,
      city: parsed.city,
      stadium: parsed.stadium,
      example_game: game.opponent_name || null,
      files_present: [],
      suggested_filenames: IMAGE_EXTENSIONS.map((ext) => `${parsed.slug}${ext}`),
    });
  }

  return [...bySlug.values()];
}

async function exists(file: string): Promise<boolean> {
  return fs
    .access(file)
    .then(() => true)
    .catch(() => false);
}

export async function findStadiumFiles(
  entries: StadiumEntry[],
  stadiumDir: string
): Promise<StadiumEntry[]> {
  return Promise.all(
    entries.map(async (entry) => {
      const present: string[] = [];
      for (const filename of entry.suggested_filenames) {
        if (await exists(path.join(stadiumDir, filename))) {
          present.push(path.posix.join(stadiumDir.split(path.sep).join("/"), filename));
        }
      }
      return { ...entry, files_present: present };
    })
  );
}

const bySlug = (a: StadiumEntry, b: StadiumEntry) => a.slug.localeCompare(b.slug);

export function buildManifest(
  entries: StadiumEntry[],
  generatedFrom: string,
  stadiumDir: string
): StadiumManifest {
  return {
    generated_from: generatedFrom,
    stadium_dir: stadiumDir,
    found: entries.filter((e) => e.files_present.length).sort(bySlug),
    missing: entries.filter((e) => !e.files_present.length).sort(bySlug),
    notes: {
      naming_rule: `${stadiumDir}/<slug>.jpg|.png|.webp`,
      slug_source: "Prefer <stadium> + <city>. If no stadium, use <city>.",
      slug_rules: "lowercase; non-alphanumerics -> '-'; '&' -> 'and'; collapse repeats.",
    },
  };
}

export function renderStadiumMarkdown(manifest: StadiumManifest): string {
  const dir = manifest.stadium_dir;
  const lines: string[] = [
    "# Stadium Images Status",
    "",
    `Drop images in \`${dir}/\` named by the **slug** below. Any of \`.jpg\`, \`.png\`, \`.webp\` works.`,
    "",
    "## Missing",
    "",
  ];

  if (manifest.missing.length) {
    lines.push("| Opponent (example) | City / Stadium | File to add |", "|---|---|---|");
    for (const entry of manifest.missing) {
      lines.push(
        `| ${entry.example_game ?? ""} | ${entry.location_raw} | \`${dir}/${entry.suggested_filenames[0]}\` |`
      );
    }
  } else {
    lines.push("_None, every stadium has an image._");
  }

  lines.push("", "## Found", "");
  if (manifest.found.length) {
    lines.push("| Opponent (example) | City / Stadium | Files present |", "|---|---|---|");
    for (const entry of manifest.found) {
      const files = entry.files_present.map((file) => `\`${file}\``).join(", ");
      lines.push(`| ${entry.example_game ?? ""} | ${entry.location_raw} | ${files} |`);
    }
  } else {
    lines.push("_No stadium images found yet._");
  }

  return lines.join("\n") + "\n";
}
