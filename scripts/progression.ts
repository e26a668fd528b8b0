#!/usr/bin/env tsx
import 'dotenv/config';
import { readFileSync } from 'node:fs';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { z } from 'zod';

import { ACHIEVEMENT_IDS } from '../src/achievements/types.js';
import { loadConfig } from '../src/config.js';
import { closePool } from '../src/db/client.js';
import { computeExperienceAward } from '../src/engine/experience.js';
import { cumulativeExperienceForLevel } from '../src/engine/leveling.js';
import type { MatchRecord } from '../src/engine/types.js';
import { parseMatchHistory, parseMatchRecord } from '../src/formats/index.js';
import { computeInsights } from '../src/insights/calculator.js';
import { ProgressionService, ProgressValueSchema } from '../src/services/progression.js';
import { getStore } from '../src/store/index.js';

const readJson = (file: string): unknown => JSON.parse(readFileSync(file, 'utf8'));

const loadMatch = (file: string): MatchRecord => {
  const result = parseMatchRecord(readJson(file));
  if (!result.ok) {
    throw new Error(`${file}: ${result.message}${result.issues ? ` ${JSON.stringify(result.issues)}` : ''}`);
  }
  return result.match;
};

const loadHistory = (file: string): MatchRecord[] => {
  const result = parseMatchHistory(readJson(file));
  if (!result.ok) {
    throw new Error(`${file}: ${result.message}${result.issues ? ` ${JSON.stringify(result.issues)}` : ''}`);
  }
  return result.matches;
};

const createService = () => {
  const config = loadConfig();
  return new ProgressionService(getStore(), { utcOffsetMinutes: config.utcOffsetMinutes });
};

const runInsights = (file: string) => {
  const insights = computeInsights(loadMatch(file));
  if (!insights) {
    console.log('Not enough point events for insights.');
    return;
  }
  console.log(JSON.stringify(insights, null, 2));
};

const runAward = (file: string) => {
  const award = computeExperienceAward(loadMatch(file));
  for (const entry of award.breakdown) {
    console.log(`${entry.label.padEnd(16)} +${entry.amount}`);
  }
  console.log(`${'Total'.padEnd(16)} ${award.totalAwarded}`);
};

const runLevels = (upTo: number) => {
  for (let level = 1; level <= upTo; level += 1) {
    console.log(`level ${String(level).padStart(3)}  ${cumulativeExperienceForLevel(level)} xp`);
  }
};

const runRecord = async (profileId: string, historyFile: string, matchId?: string, startedAt?: string) => {
  const history = loadHistory(historyFile);
  const match = matchId ? history.find((entry) => entry.id === matchId) : history[history.length - 1];
  if (!match) {
    throw new Error(matchId ? `match ${matchId} not found in ${historyFile}` : `${historyFile} contains no matches`);
  }
  const profileStartedAt = startedAt ? new Date(startedAt) : null;
  if (profileStartedAt && Number.isNaN(profileStartedAt.getTime())) {
    throw new Error(`invalid --started-at value ${startedAt}`);
  }

  const result = await createService().recordMatch({ profileId, match, history, profileStartedAt });
  if (result.duplicate) {
    console.log(`Match ${match.id} was already recorded for ${profileId}.`);
    return;
  }
  for (const crossing of result.achievements.unlocked) {
    console.log(`Unlocked ${crossing.id} ${crossing.tier} (+${crossing.points})`);
  }
  if (result.reward) {
    console.log(
      `+${result.reward.totalAwarded} xp, level ${result.experience.level} (${result.experience.experienceIntoLevel}/${result.experience.experienceForNextLevel})${result.reward.leveledUp ? ' LEVEL UP' : ''}`
    );
  }
  console.log(`Achievement points: ${result.achievements.totalPoints}`);
};

const runProgress = async (profileId: string, achievement: string, value: number) => {
  const id = z.enum(ACHIEVEMENT_IDS).parse(achievement);
  const amount = ProgressValueSchema.parse(value);
  const crossing = await createService().reportProgress(profileId, id, amount);
  console.log(crossing ? `Unlocked ${crossing.id} ${crossing.tier} (+${crossing.points})` : 'No new tier reached.');
};

const runSummary = async (profileId: string) => {
  const summary = await createService().getProfile(profileId);
  console.log(JSON.stringify(summary, null, 2));
};

const runReset = async (profileId: string, confirmed: boolean) => {
  if (!confirmed) {
    console.log('Refusing to reset without --yes.');
    process.exitCode = 1;
    return;
  }
  await createService().resetProfile(profileId);
  console.log(`Reset progression for ${profileId}.`);
};

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName('progression')
    .command(
      'insights <file>',
      'Print the insights derived from a match record',
      (cmd) => cmd.positional('file', { type: 'string', demandOption: true, describe: 'Match record JSON' }),
      (argv) => runInsights(argv.file)
    )
    .command(
      'award <file>',
      'Print the experience breakdown for a match record',
      (cmd) => cmd.positional('file', { type: 'string', demandOption: true, describe: 'Match record JSON' }),
      (argv) => runAward(argv.file)
    )
    .command(
      'levels',
      'Print cumulative experience per level',
      (cmd) => cmd.option('up-to', { type: 'number', default: 10, describe: 'Highest level to list' }),
      (argv) => runLevels(argv.upTo)
    )
    .command(
      'record <profileId> <historyFile>',
      'Record a match for a profile and evaluate achievements against its history',
      (cmd) =>
        cmd
          .positional('profileId', { type: 'string', demandOption: true })
          .positional('historyFile', { type: 'string', demandOption: true, describe: 'JSON array of match records' })
          .option('match', { type: 'string', describe: 'Match id to record (defaults to the latest)' })
          .option('started-at', { type: 'string', describe: 'ISO timestamp the profile was created' }),
      (argv) => runRecord(argv.profileId, argv.historyFile, argv.match, argv.startedAt)
    )
    .command(
      'progress <profileId> <achievement> <value>',
      'Report a counter tracked outside match history, such as rating_climber',
      (cmd) =>
        cmd
          .positional('profileId', { type: 'string', demandOption: true })
          .positional('achievement', { type: 'string', demandOption: true })
          .positional('value', { type: 'number', demandOption: true }),
      (argv) => runProgress(argv.profileId, argv.achievement, argv.value)
    )
    .command(
      'summary <profileId>',
      'Print level, points and top achievements for a profile',
      (cmd) => cmd.positional('profileId', { type: 'string', demandOption: true }),
      (argv) => runSummary(argv.profileId)
    )
    .command(
      'reset <profileId>',
      'Delete all progression data for a profile',
      (cmd) =>
        cmd
          .positional('profileId', { type: 'string', demandOption: true })
          .option('yes', { type: 'boolean', default: false, describe: 'Confirm the reset' }),
      (argv) => runReset(argv.profileId, argv.yes)
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

main()
  .catch((err) => {
    console.error(err);
    process.exitCode = 1;
  })
  .finally(async () => {
    try {
      await closePool();
    } catch (err) {
      console.error('Failed to close database connection', err);
    }
  });
