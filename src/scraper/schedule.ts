import type {
  GameOutcome,
  GameResult,
  ScheduleGameRecord,
  ScheduleLink,
  VenueType,
} from "../types";
import { resolveUrl } from "../urls";
import { logger } from "../utils/logger";
import { parseHtml } from "./dom";
import type { HtmlNode } from "./dom";

const SELECTORS = {
  item: ".schedule-event-item",
  venueLabel: ".schedule-event-venue__type-label",
  weekday: ".schedule-event-date__time time",
  date: ".schedule-event-date__label",
  result: ".schedule-event-item-result",
  win: ".schedule-event-item-result__win",
  loss: ".schedule-event-item-result__loss",
  tie: ".schedule-event-item-result__tie",
  resultLabel: ".schedule-event-item-result__label",
  scoreLabel:
    ".schedule-event-item-result__label, .schedule-event-item-result__wrapper",
  logoWrappers:
    ".schedule-event-item-default__images .schedule-event-item-default__image-wrapper",
  divider: ".schedule-event-item-default__divider",
  opponentName: ".schedule-event-item-default__opponent-name",
  location:
    ".schedule-event-item-default__location .schedule-event-location",
  tvLogo: ".schedule-event-bottom__link img, .schedule-event-item-links__image",
  link: ".schedule-event-bottom__link",
  linkTitle: ".schedule-event-item-links__title",
} as const;

const VENUE_TYPES: Record<string, VenueType> = {
  home: "Home",
  away: "Away",
  neutral: "Neutral",
};

export interface ExtractOptions {
  /** Page URL that relative image and link URLs are resolved against. */
  baseUrl?: string;
}

type Outcome =
  | { status: "final"; result: GameResult }
  | { status: "upcoming"; kickoff: string }
  | { status: "tbd" };

export function normalizeVenueType(
  label: string | undefined,
  classNames: string[] = []
): VenueType | null {
  const word = label?.toLowerCase().match(/\b(home|away|neutral)\b/)?.[1];
  if (word) return VENUE_TYPES[word];

  for (const className of classNames) {
    const modifier = className.toLowerCase().match(/--(home|away|neutral)$/)?.[1];
    if (modifier) return VENUE_TYPES[modifier];
  }
  return null;
}

/** Picks the "20-17" score out of label text such as "W, 20-17 (2-1)". */
export function extractScore(text: string): string {
  return text.match(/\b\d+-\d+\b/)?.[0] ?? text;
}

function readOutcome(item: HtmlNode): Outcome {
  const block = item.selectOne(SELECTORS.result);
  if (!block) return { status: "tbd" };

  let outcome: GameOutcome | undefined;
  if (block.selectOne(SELECTORS.win)) outcome = "W";
  else if (block.selectOne(SELECTORS.loss)) outcome = "L";
  else if (block.selectOne(SELECTORS.tie)) outcome = "T";

  if (outcome) {
    const label = block.selectOne(SELECTORS.scoreLabel);
    const score = label ? extractScore(label.text(" ")) : "";
    return { status: "final", result: { outcome, score } };
  }

  const kickoff = block.selectOne(SELECTORS.resultLabel)?.text(" ");
  if (kickoff) return { status: "upcoming", kickoff };

  return { status: "tbd" };
}

function isUsableImageUrl(value: string | undefined): value is string {
  return !!value && !value.startsWith("data:");
}

/**
 * Lazy-loaded images keep a placeholder in src and the real URL in
 * data-src or srcset.
 */
function imageUrl(img: HtmlNode | null, baseUrl: string | undefined): string | undefined {
  if (!img) return undefined;
  const srcset = img.attr("srcset")?.trim().split(/\s+/)[0];
  const candidates = [img.attr("src")?.trim(), img.attr("data-src")?.trim(), srcset];
  const url = candidates.find(isUsableImageUrl);
  return url ? resolveUrl(url, baseUrl) : undefined;
}

function readLinks(item: HtmlNode, baseUrl: string | undefined): ScheduleLink[] {
  const links: ScheduleLink[] = [];
  for (const anchor of item.selectAll(SELECTORS.link)) {
    const href = anchor.attr("href")?.trim();
    if (!href) continue;

    const title =
      anchor.selectOne(SELECTORS.linkTitle)?.text() ||
      anchor.text(" ") ||
      anchor.selectOne("img")?.attr("alt")?.trim() ||
      "";
    links.push({ title, href: resolveUrl(href, baseUrl) });
  }
  return links;
}

function parseItem(
  item: HtmlNode,
  index: number,
  baseUrl: string | undefined
): ScheduleGameRecord {
  const missing: string[] = [];
  const required = (field: string, value: string | undefined): string => {
    if (!value) missing.push(field);
    return value ?? "";
  };

  const venueLabel = item.selectOne(SELECTORS.venueLabel)?.text();
  const venue_type = normalizeVenueType(venueLabel, item.classNames());
  if (!venue_type) missing.push("venue_type");

  const [nebraskaWrapper, opponentWrapper] = item.selectAll(SELECTORS.logoWrappers);
  const tvLogo = imageUrl(item.selectOne(SELECTORS.tvLogo), baseUrl);
  const outcome = readOutcome(item);

  if (outcome.status === "final" && !outcome.result.score) {
    missing.push("score");
  }

  const fields = {
    venue_type,
    weekday: required("weekday", item.selectOne(SELECTORS.weekday)?.text()),
    date_text: required("date_text", item.selectOne(SELECTORS.date)?.text()),
    divider_text: required("divider_text", item.selectOne(SELECTORS.divider)?.text()),
    nebraska_logo_url: required(
      "nebraska_logo_url",
      imageUrl(nebraskaWrapper?.selectOne("img") ?? null, baseUrl)
    ),
    opponent_logo_url: required(
      "opponent_logo_url",
      imageUrl(opponentWrapper?.selectOne("img") ?? null, baseUrl)
    ),
    opponent_name: required(
      "opponent_name",
      item.selectOne(SELECTORS.opponentName)?.text()
    ),
    location: required("location", item.selectOne(SELECTORS.location)?.text(" ")),
    ...(tvLogo ? { tv_network_logo_url: tvLogo } : {}),
    links: readLinks(item, baseUrl),
  };

  if (missing.length) {
    logger.warn(
      `Schedule item ${index + 1} (${fields.opponent_name || "unknown opponent"}) is missing ${missing.join(", ")}`
    );
  }

  switch (outcome.status) {
    case "final":
      return { ...fields, status: "final", result: outcome.result };
    case "upcoming":
      return { ...fields, status: "upcoming", kickoff: outcome.kickoff };
    case "tbd":
      return { ...fields, status: "tbd" };
  }
}

/**
 * Extracts one record per schedule item, in page order.
 *
 * Missing required text and URL fields default to an empty string (an
 * unrecognized venue to null) and the record is still emitted.
 */
export function extractSchedule(
  html: string,
  options: ExtractOptions = {}
): ScheduleGameRecord[] {
  const page = parseHtml(html);
  const items = page.selectAll(SELECTORS.item);

  if (!items.length) {
    logger.warn("No schedule items found on the page");
    return [];
  }

  logger.debug(`Found ${items.length} schedule items`);
  return items.map((item, index) => parseItem(item, index, options.baseUrl));
}
