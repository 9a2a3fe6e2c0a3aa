import { z } from "zod";

const LinkSchema = z.object({
  title: z.string(),
  href: z.string(),
});

const GameFieldsSchema = z.object({
  venue_type: z.enum(["Home", "Away", "Neutral"]).nullable(),
  weekday: z.string(),
  date_text: z.string(),
  divider_text: z.string(),
  nebraska_logo_url: z.string(),
  opponent_logo_url: z.string(),
  opponent_name: z.string(),
  location: z.string(),
  tv_network_logo_url: z.string().optional(),
  links: z.array(LinkSchema),
});

export const ScheduleGameRecordSchema = z.discriminatedUnion("status", [
  GameFieldsSchema.extend({
    status: z.literal("final"),
    result: z.object({
      outcome: z.enum(["W", "L", "T"]),
      score: z.string(),
    }),
  }).strict(),
  GameFieldsSchema.extend({
    status: z.literal("upcoming"),
    kickoff: z.string(),
  }).strict(),
  GameFieldsSchema.extend({
    status: z.literal("tbd"),
  }).strict(),
]);

export const SchedulePayloadSchema = z.object({
  source_url: z.string().url(),
  scraped_at: z.string().datetime(),
  games: z.array(ScheduleGameRecordSchema),
});
