import type winston from 'winston';
import {
  GameDefinition,
  GameOutcome,
  GameState,
  PLAYER_IDS,
  PlayerId,
  Returns,
  findBookkeepingProblems,
  findSelfAdjacencyViolations,
  returnsMatchOutcome,
} from '../../shared/engine';
import { EngineError, EngineErrorCode } from '../../shared/engine/errors';
import { SeededRNG } from '../../shared/utils/rng';

export interface SelfPlayGameSummary {
  seed: number;
  /** Every applied action, passes included. */
  actions: number;
  placements: number;
  passes: number;
  scores: Record<PlayerId, number>;
  outcome: GameOutcome;
  returns: Returns;
}

export interface SelfPlayOptions {
  /** Check the board invariants after every action, not only at the end. */
  checkEveryAction?: boolean;
  logger?: winston.Logger;
}

/**
 * Plays seeded, uniformly random legal games against one definition and
 * checks the engine invariants along the way. A violated invariant aborts
 * the run with an EngineError carrying the offending seed.
 */
export class SelfPlayRunner {
  private readonly checkEveryAction: boolean;
  private readonly logger: winston.Logger | undefined;

  constructor(
    readonly definition: GameDefinition,
    options: SelfPlayOptions = {}
  ) {
    this.checkEveryAction = options.checkEveryAction ?? true;
    this.logger = options.logger;
  }

  playGame(seed: number): SelfPlayGameSummary {
    const rng = new SeededRNG(seed);
    const game = this.definition.newInitialState();
    // Each round every active player either places or finishes, so no game
    // lasts more than one round per piece plus a final passing round.
    const actionLimit = (this.definition.pieces.size + 1) * this.definition.numPlayers;

    let actions = 0;
    let passes = 0;
    while (!game.isTerminal()) {
      if (actions >= actionLimit) {
        throw new EngineError(
          EngineErrorCode.INTERNAL_ASSERTION_FAILED,
          `Self-play game ${seed} did not end within ${actionLimit} actions`,
          { seed, actions },
          'SelfPlay'
        );
      }
      const action = rng.pick(game.legalActions());
      if (action === this.definition.passAction) {
        passes += 1;
      }
      game.applyAction(action);
      actions += 1;
      if (this.checkEveryAction) {
        this.checkInvariants(game.getGameState(), seed, actions);
      }
    }
    if (!this.checkEveryAction) {
      this.checkInvariants(game.getGameState(), seed, actions);
    }

    const state = game.getGameState();
    const summary: SelfPlayGameSummary = {
      seed,
      actions,
      placements: actions - passes,
      passes,
      scores: {
        0: state.players[0].score,
        1: state.players[1].score,
        2: state.players[2].score,
        3: state.players[3].score,
      },
      outcome: state.outcome,
      returns: game.returns(),
    };
    this.logger?.info('Self-play game finished', summary);
    return summary;
  }

  /** Play `games` games with seeds `firstSeed`, `firstSeed + 1`, … */
  run(games: number, firstSeed: number): SelfPlayGameSummary[] {
    const summaries: SelfPlayGameSummary[] = [];
    for (let n = 0; n < games; n += 1) {
      summaries.push(this.playGame(firstSeed + n));
    }
    const wins = PLAYER_IDS.map(
      (id) => summaries.filter((s) => s.outcome.kind === 'winner' && s.outcome.player === id).length
    );
    this.logger?.info('Self-play run finished', {
      games,
      firstSeed,
      wins,
      draws: summaries.filter((s) => s.outcome.kind === 'draw').length,
    });
    return summaries;
  }

  private checkInvariants(
    state: GameState,
    seed: number,
    actions: number
  ): void {
    const adjacency = findSelfAdjacencyViolations(state, this.definition);
    const bookkeeping = findBookkeepingProblems(state, this.definition);
    const returnsOk = returnsMatchOutcome(state);
    if (adjacency.length > 0 || bookkeeping.length > 0 || !returnsOk) {
      const error = new EngineError(
        EngineErrorCode.INTERNAL_ASSERTION_FAILED,
        `Invariant violated in self-play game ${seed} after ${actions} actions`,
        { seed, actions, adjacency, bookkeeping, outcome: state.outcome },
        'SelfPlay'
      );
      this.logger?.error('Self-play invariant violation', { error });
      throw error;
    }
  }
}
