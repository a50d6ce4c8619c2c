import { SelfPlayRunner } from '../../src/host/selfplay/SelfPlayRunner';
import { createHostLogger } from '../../src/host/utils/logger';
import { getDefinition } from '../utils/fixtures';

describe('SelfPlayRunner', () => {
  const definition = getDefinition(6);

  it('plays a seeded game to the end and summarizes it', () => {
    const summary = new SelfPlayRunner(definition).playGame(11);
    expect(summary.seed).toBe(11);
    expect(summary.actions).toBe(summary.placements + summary.passes);
    expect(summary.passes).toBeGreaterThanOrEqual(1);
    expect(summary.placements).toBeLessThanOrEqual(definition.maxGameLength);

    const { outcome, returns, scores } = summary;
    if (outcome.kind === 'winner') {
      expect(returns[outcome.player]).toBe(1);
      expect(Math.min(...Object.values(scores))).toBe(scores[outcome.player]);
    } else {
      expect(outcome.kind).toBe('draw');
      expect(returns).toEqual([0, 0, 0, 0]);
    }
  });

  it('is deterministic per seed', () => {
    const runner = new SelfPlayRunner(definition, { checkEveryAction: false });
    expect(runner.playGame(5)).toEqual(runner.playGame(5));
  });

  it('runs consecutive seeds and logs each game and the totals', () => {
    const logger = createHostLogger({ level: 'info', format: 'json', silent: true, environment: 'test' });
    const info = jest.spyOn(logger, 'info');
    const summaries = new SelfPlayRunner(definition, { logger }).run(3, 20);

    expect(summaries.map((s) => s.seed)).toEqual([20, 21, 22]);
    expect(info).toHaveBeenCalledTimes(4);
    expect(info).toHaveBeenLastCalledWith(
      'Self-play run finished',
      expect.objectContaining({ games: 3, firstSeed: 20 })
    );
  });
});
