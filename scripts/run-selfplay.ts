#!/usr/bin/env ts-node
/**
 * Self-play soak harness.
 *
 * Plays seeded random games on a configurable board and checks the engine
 * invariants after every action. Defaults come from the environment
 * (POLYBLOCK_SELFPLAY_GAMES, POLYBLOCK_SELFPLAY_SEED, POLYBLOCK_BOARD_ROWS,
 * POLYBLOCK_BOARD_COLS); flags override them:
 *
 *   npm run selfplay -- --games=20 --seed=7 --rows=10 --cols=10
 */

import { config } from '../src/host/config';
import { parseSelfPlayArgs } from '../src/host/selfplay/cliArgs';
import { SelfPlayRunner } from '../src/host/selfplay/SelfPlayRunner';
import { logger } from '../src/host/utils/logger';
import { GameDefinition } from '../src/shared/engine';
import { wrapEngineError } from '../src/shared/engine/errors';

function main(): void {
  const options = parseSelfPlayArgs(process.argv, {
    games: config.selfPlay.games,
    seed: config.selfPlay.seed,
    rows: config.board.rows,
    cols: config.board.cols,
  });

  const definition = new GameDefinition({ rows: options.rows, cols: options.cols });
  logger.info('Self-play starting', {
    ...options,
    totalMoves: definition.moves.totalMoves,
    numDistinctActions: definition.numDistinctActions,
  });

  const runner = new SelfPlayRunner(definition, { logger });
  runner.run(options.games, options.seed);
}

try {
  main();
} catch (error) {
  logger.error('Self-play failed', { error: wrapEngineError(error, 'SelfPlay') });
  process.exitCode = 1;
}
