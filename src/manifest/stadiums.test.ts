import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { ScheduleGameRecord } from "../types";
import {
  buildManifest,
  collectStadiums,
  findStadiumFiles,
  parseLocation,
  renderStadiumMarkdown,
} from "./stadiums";

function game(opponent_name: string, location: string): ScheduleGameRecord {
  return {
    venue_type: "Home",
    weekday: "Saturday",
    date_text: "Sep 6",
    status: "tbd",
    divider_text: "vs.",
    nebraska_logo_url: "",
    opponent_logo_url: "",
    opponent_name,
    location,
    links: [],
  };
}

describe("parseLocation", () => {
  it("splits city and stadium and slugs stadium first", () => {
    expect(parseLocation("Lincoln, Neb. / Memorial Stadium")).toEqual({
      city: "Lincoln, Neb.",
      stadium: "Memorial Stadium",
      slug: "memorial-stadium-lincoln-neb",
    });
  });

  it("uses the city alone when there is no stadium", () => {
    expect(parseLocation("Dublin, Ireland")).toEqual({
      city: "Dublin, Ireland",
      stadium: null,
      slug: "dublin-ireland",
    });
  });

  it("returns null for an empty location", () => {
    expect(parseLocation("  ")).toBeNull();
  });
});

describe("collectStadiums", () => {
  it("keeps one entry per stadium with the first opponent as example", () => {
    const entries = collectStadiums([
      game("Cincinnati", "Lincoln, Neb. / Memorial Stadium"),
      game("Houston", "Houston, Texas / TDECU Stadium"),
      game("Akron", "Lincoln, Neb. / Memorial Stadium"),
      game("Michigan", ""),
    ]);

    expect(entries.map((e) => [e.slug, e.example_game])).toEqual([
      ["memorial-stadium-lincoln-neb", "Cincinnati"],
      ["tdecu-stadium-houston-texas", "Houston"],
    ]);
    expect(entries[0].suggested_filenames).toEqual([
      "memorial-stadium-lincoln-neb.jpg",
      "memorial-stadium-lincoln-neb.png",
      "memorial-stadium-lincoln-neb.webp",
    ]);
  });
});

describe("stadium manifest", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "stadiums-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("splits stadiums into found and missing by the images on disk", async () => {
    await fs.writeFile(path.join(dir, "tdecu-stadium-houston-texas.webp"), "");

    const entries = await findStadiumFiles(
      collectStadiums([
        game("Cincinnati", "Lincoln, Neb. / Memorial Stadium"),
        game("Houston", "Houston, Texas / TDECU Stadium"),
      ]),
      dir
    );
    const manifest = buildManifest(entries, "data/huskers_schedule.json", dir);
    const posixDir = dir.split(path.sep).join("/");

    expect(manifest.found.map((e) => e.files_present)).toEqual([
      [`${posixDir}/tdecu-stadium-houston-texas.webp`],
    ]);
    expect(manifest.missing.map((e) => e.slug)).toEqual(["memorial-stadium-lincoln-neb"]);
  });

  it("renders a markdown status table", () => {
    const [memorial, tdecu] = collectStadiums([
      game("Cincinnati", "Lincoln, Neb. / Memorial Stadium"),
      game("Houston", "Houston, Texas / TDECU Stadium"),
    ]);
    const manifest = buildManifest(
      [memorial, { ...tdecu, files_present: ["stadiums/tdecu-stadium-houston-texas.png"] }],
      "data/huskers_schedule.json",
      "stadiums"
    );

    expect(renderStadiumMarkdown(manifest).split("\n")).toEqual([
      "# Stadium Images Status",
      "",
      "Drop images in `stadiums/` named by the **slug** below. Any of `.jpg`, `.png`, `.webp` works.",
      "",
      "## Missing",
      "",
      "| Opponent (example) | City / Stadium | File to add |",
      "|---|---|---|",
      "| Cincinnati | Lincoln, Neb. / Memorial Stadium | `stadiums/memorial-stadium-lincoln-neb.jpg` |",
      "",
      "## Found",
      "",
      "| Opponent (example) | City / Stadium | Files present |",
      "|---|---|---|",
      "| Houston | Houston, Texas / TDECU Stadium | `stadiums/tdecu-stadium-houston-texas.png` |",
      "",
    ]);
  });
});
