import { createLogger, toVerbosity } from '../src/util/logger.js';

describe('tiny logger', () => {
  it('obeys verbosity levels', () => {
    const sink: string[] = [];
    const log = createLogger(2, m => sink.push(m));

    log.log(3, 'low-prio');   // should be ignored
    log.log(1, 'important');
    expect(sink).toEqual(['1| important']);
  });

  it('clamps repeated flag counts into 0..4', () => {
    expect(toVerbosity(-1)).toBe(0);
    expect(toVerbosity(0)).toBe(0);
    expect(toVerbosity(3)).toBe(3);
    expect(toVerbosity(9)).toBe(4);
  });
});
