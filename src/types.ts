export type VenueType = "Home" | "Away" | "Neutral";

export type GameStatus = "final" | "upcoming" | "tbd";

export type GameOutcome = "W" | "L" | "T";

export interface GameResult {
  readonly outcome: GameOutcome;
  // display text, e.g. "20-17"
  readonly score: string;
}

export interface ScheduleLink {
  readonly title: string;
  readonly href: string;
}

interface ScheduleGameFields {
  readonly venue_type: VenueType | null;
  readonly weekday: string;
  readonly date_text: string;
  readonly divider_text: string;
  readonly nebraska_logo_url: string;
  readonly opponent_logo_url: string;
  readonly opponent_name: string;
  readonly location: string;
  readonly tv_network_logo_url?: string;
  readonly links: readonly ScheduleLink[];
}

export interface FinalGame extends ScheduleGameFields {
  readonly status: "final";
  readonly result: GameResult;
  readonly kickoff?: undefined;
}

export interface UpcomingGame extends ScheduleGameFields {
  readonly status: "upcoming";
  readonly kickoff: string;
  readonly result?: undefined;
}

export interface TbdGame extends ScheduleGameFields {
  readonly status: "tbd";
  readonly result?: undefined;
  readonly kickoff?: undefined;
}

export type ScheduleGameRecord = FinalGame | UpcomingGame | TbdGame;

export interface SchedulePayload {
  readonly source_url: string;
  readonly scraped_at: string;
  readonly games: readonly ScheduleGameRecord[];
}
