import type { MatchRecord, PointEvent, SetScore, Sport } from '../engine/types.js';
import { getSportProfile } from '../engine/profiles.js';
import { defaultCatalog, type AchievementCatalog } from './catalog.js';
import { applyProgress, totalAchievementPoints } from './tracker.js';
import { ACHIEVEMENT_IDS, type AchievementId, type ProgressMap, type TierCrossing } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;

const THRESHOLDS = {
  comebackDeficit: 5,
  earlyBirdHour: 7,
  nightOwlHour: 22,
  perfectStartPoints: 3,
  cleanSweepWins: 3,
  marathonSeconds: 45 * 60,
  speedDemonSeconds: 10 * 60,
  deuceStreak: 5,
  tournamentWeekGames: 10,
  yearDays: 365,
  pickleScore: 11,
  bagelGames: 6,
};

// month (1-12), day
const HOLIDAYS: ReadonlyArray<[number, number]> = [
  [1, 1],
  [7, 4],
  [12, 25],
  [12, 31],
];

export interface EvaluationOptions {
  now?: Date;
  // Offset of the player's local clock from UTC; calendar rules are evaluated in that clock.
  utcOffsetMinutes?: number;
  profileStartedAt?: Date | null;
  catalog?: AchievementCatalog;
}

export interface EvaluationResult {
  progress: ProgressMap;
  unlocked: TierCrossing[];
  totalPoints: number;
}

interface LocalTime {
  dayIndex: number;
  weekIndex: number;
  year: number;
  month: number;
  day: number;
  hour: number;
  weekday: number;
}

const toLocal = (date: Date, offsetMinutes: number): LocalTime => {
  const shifted = new Date(date.getTime() + offsetMinutes * MINUTE_MS);
  const dayIndex = Math.floor(shifted.getTime() / DAY_MS);
  return {
    dayIndex,
    // Day 0 of the epoch is a Thursday; weeks start on Monday.
    weekIndex: Math.floor((dayIndex + 3) / 7),
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
    hour: shifted.getUTCHours(),
    weekday: shifted.getUTCDay(),
  };
};

const isWin = (match: MatchRecord) => match.outcome === 'WIN';

const countBy = <K>(items: readonly K[]) => {
  const counts = new Map<K, number>();
  for (const item of items) counts.set(item, (counts.get(item) ?? 0) + 1);
  return counts;
};

const maxDeficit = (events: readonly PointEvent[]) =>
  events.reduce((max, event) => Math.max(max, event.player2Score - event.player1Score), 0);

/** Consecutive-day streak ending today; 0 once a day has been missed. Days after today are ignored. */
export const currentDailyStreak = (days: readonly number[], today: number) => {
  const unique = [...new Set(days.filter((day) => day <= today))].sort((a, b) => b - a);
  if (!unique.length || unique[0] < today) return 0;
  let streak = 1;
  for (let idx = 1; idx < unique.length; idx += 1) {
    if (unique[idx - 1] - unique[idx] !== 1) break;
    streak += 1;
  }
  return streak;
};

const longestDeuceWinStreak = (match: MatchRecord) => {
  const floor = getSportProfile(match.sport).gamePointFloor;
  let previous = { player1Score: 0, player2Score: 0 };
  let streak = 0;
  let best = 0;
  for (const event of match.events) {
    const atDeuce = previous.player1Score === previous.player2Score && previous.player1Score >= floor;
    if (atDeuce) {
      streak = event.scoringPlayer === 'player1' ? streak + 1 : 0;
      best = Math.max(best, streak);
    }
    previous = event;
  }
  return best;
};

const isShutoutSet = (set: SetScore) => set.player1Games === THRESHOLDS.bagelGames && set.player2Games === 0;

// Sets won 6-0; without set detail the final score stands in for the set.
const shutoutSets = (match: MatchRecord) => {
  if (match.sets?.length) return match.sets.filter(isShutoutSet).length;
  return isWin(match) && match.player1Score === THRESHOLDS.bagelGames && match.player2Score === 0 ? 1 : 0;
};

const tiebreaksWon = (match: MatchRecord) =>
  (match.sets ?? []).filter((set) => set.tiebreak && set.tiebreak.player1 > set.tiebreak.player2).length;

const sum = (values: number[]) => values.reduce((total, value) => total + value, 0);
const flag = (condition: boolean) => (condition ? 1 : 0);

/**
 * Derives the cumulative counter behind every evaluable achievement from a
 * profile's full match history. `rating_climber` has no counter here and is
 * reported by the host as an external signal.
 */
export function collectAchievementValues(
  history: readonly MatchRecord[],
  options: EvaluationOptions = {}
): Partial<Record<AchievementId, number>> {
  const now = options.now ?? new Date();
  const offset = options.utcOffsetMinutes ?? 0;
  const today = toLocal(now, offset);
  const local = history.map((match) => ({ match, at: toLocal(match.playedAt, offset) }));
  const wins = local.filter(({ match }) => isWin(match));
  const ofSport = (sport: Sport) => history.filter((match) => match.sport === sport);

  const streak = currentDailyStreak(
    local.map(({ at }) => at.dayIndex),
    today.dayIndex
  );

  const started = options.profileStartedAt ? toLocal(options.profileStartedAt, offset) : null;
  const isAnniversary =
    started !== null && started.year < today.year && started.month === today.month && started.day === today.day;

  const thisYear = local
    .filter(({ at }) => at.year === today.year)
    .sort((a, b) => a.match.playedAt.getTime() - b.match.playedAt.getTime());

  const winsPerDay = countBy(wins.map(({ at }) => at.dayIndex));
  const gamesPerWeek = countBy(local.map(({ at }) => at.weekIndex));

  const pickleball = ofSport('PICKLEBALL');
  const tennis = ofSport('TENNIS');
  const padel = ofSport('PADEL');

  return {
    games_played: history.length,
    daily_streak: streak,
    victories: wins.length,
    comebacks: wins.filter(({ match }) => maxDeficit(match.events) >= THRESHOLDS.comebackDeficit).length,
    early_bird: flag(wins.some(({ at }) => at.hour < THRESHOLDS.earlyBirdHour)),
    night_owl: flag(wins.some(({ at }) => at.hour >= THRESHOLDS.nightOwlHour)),
    weekend_warrior: local.filter(({ at }) => at.weekday === 0 || at.weekday === 6).length,
    anniversary_win: flag(isAnniversary && wins.some(({ at }) => at.dayIndex === today.dayIndex)),
    holiday_hustle: flag(local.some(({ at }) => HOLIDAYS.some(([month, day]) => at.month === month && at.day === day))),
    new_year_champion: flag(thisYear.length > 0 && isWin(thisYear[0].match)),
    perfect_start: flag(
      wins.some(
        ({ match }) =>
          match.events.length >= THRESHOLDS.perfectStartPoints &&
          match.events
            .slice(0, THRESHOLDS.perfectStartPoints)
            .every((event) => event.scoringPlayer === 'player1')
      )
    ),
    clean_sweep: flag([...winsPerDay.values()].some((count) => count >= THRESHOLDS.cleanSweepWins)),
    marathon_match: flag(history.some((match) => match.elapsedSeconds >= THRESHOLDS.marathonSeconds)),
    speed_demon: flag(wins.some(({ match }) => match.elapsedSeconds < THRESHOLDS.speedDemonSeconds)),
    deuce_master: flag(
      history.some(
        (match) =>
          getSportProfile(match.sport).scoringModel === 'SERVER_ADVANTAGE' &&
          longestDeuceWinStreak(match) >= THRESHOLDS.deuceStreak
      )
    ),
    tournament_ready: flag([...gamesPerWeek.values()].some((count) => count >= THRESHOLDS.tournamentWeekGames)),
    cross_sport: new Set(history.map((match) => match.sport)).size,
    century_club: sum(history.map((match) => match.player1Score)),
    one_year_strong: flag(
      options.profileStartedAt !== undefined &&
        options.profileStartedAt !== null &&
        (now.getTime() - options.profileStartedAt.getTime()) / DAY_MS >= THRESHOLDS.yearDays
    ),
    diamond_hands: streak,
    pb_victories: pickleball.filter(isWin).length,
    pickler: pickleball.filter(
      (match) => isWin(match) && match.player1Score === THRESHOLDS.pickleScore && match.player2Score === 0
    ).length,
    pickled: pickleball.filter(
      (match) => !isWin(match) && match.player1Score === 0 && match.player2Score === THRESHOLDS.pickleScore
    ).length,
    tennis_victories: tennis.filter(isWin).length,
    bagel_baron: sum(tennis.map(shutoutSets)),
    tiebreak_titan: sum(tennis.map(tiebreaksWon)),
    padel_victories: padel.filter(isWin).length,
    rosco_royalty: sum(padel.map(shutoutSets)),
  };
}

export function evaluateAchievements(
  history: readonly MatchRecord[],
  progress: ProgressMap,
  options: EvaluationOptions = {}
): EvaluationResult {
  const catalog = options.catalog ?? defaultCatalog;
  const now = options.now ?? new Date();
  const values = collectAchievementValues(history, { ...options, now });

  let next = progress;
  const unlocked: TierCrossing[] = [];
  for (const id of ACHIEVEMENT_IDS) {
    const value = values[id];
    if (value === undefined || value <= 0) continue;
    const result = applyProgress(id, value, next, catalog, now);
    next = result.progress;
    if (result.tierJustReached) unlocked.push(result.tierJustReached);
  }

  return { progress: next, unlocked, totalPoints: totalAchievementPoints(next, catalog) };
}
