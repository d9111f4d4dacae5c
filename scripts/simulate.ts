#!/usr/bin/env node
/**
 * Run one computer-played Nertz game and print the result.
 *
 * Configuration comes from NERTZ_* environment variables, overlaid by
 * flags (see src/nertz/NertzConfig.ts).
 *
 * Usage:
 *   npx tsx scripts/simulate.ts --players 3 --seed 42
 *   npx tsx scripts/simulate.ts --seed 7 --transcript out/game-7.json
 */

import { writeFileSync, mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import { ZodError } from 'zod';
import { createEngineLogger } from '../src/core-engine/Logger';
import { TranscriptRecorder } from '../src/nertz/GameTranscript';
import { loadNertzConfig, parseCliArgs } from '../src/nertz/NertzConfig';
import { NertzEngine } from '../src/nertz/NertzEngine';
import { NertzEngineError } from '../src/nertz/NertzErrors';
import { assertInvariants } from '../src/nertz/NertzInvariants';

function main(): void {
  const config = parseCliArgs(process.argv.slice(2), loadNertzConfig());
  const logger = createEngineLogger({ level: config.logLevel });

  const engine = new NertzEngine({
    playerCount: config.playerCount,
    seed: config.seed,
    logger,
  });

  engine.startNewGame();
  const recorder = config.transcriptPath
    ? new TranscriptRecorder(engine, config.seed)
    : undefined;

  const result = engine.runGame(config.maxTurns, (turn) => {
    assertInvariants(engine.getSession());
    recorder?.recordTurn(turn);
  });

  logger.info(
    `Winner: player ${result.winner} after ${result.turnsPlayed} turns ` +
      `(${result.completed ? 'nertz emptied' : 'turn cap reached'})`,
  );
  result.finalScores.forEach((score, i) => {
    logger.info(`  Player ${i}: ${score}`);
  });

  if (recorder && config.transcriptPath) {
    const outPath = resolve(config.transcriptPath);
    mkdirSync(dirname(outPath), { recursive: true });
    writeFileSync(outPath, JSON.stringify(recorder.finalize(result), null, 2) + '\n');
    logger.info(`Transcript written to ${outPath}`);
  }
}

try {
  main();
} catch (err) {
  if (err instanceof ZodError) {
    const issues = err.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    console.error(`Invalid configuration: ${issues.join('; ')}`);
  } else if (err instanceof NertzEngineError) {
    console.error(`${err.name}: ${err.message}`);
  } else if (err instanceof Error) {
    console.error(err.message);
  } else {
    console.error(String(err));
  }
  process.exit(1);
}
