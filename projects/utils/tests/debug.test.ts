import { KotlinParser } from '../../parser/parser';
import { colors, log, logger, useColors } from '../debug';
import { iter } from '../iter';

describe('logger', () => {
  it('should capture log lines while a function runs', () => {
    const logs: string[] = [];
    const result = logger.capture(() => {
      log('first', 1);
      return 'done';
    }, logs);
    log('not captured');
    expect(result).toEqual('done');
    expect(logs).toEqual(['first 1']);
  });

  it('should capture what the parser logs', () => {
    const logs: string[] = [];
    logger.capture(() => KotlinParser.parseFile('val x = 1'), logs);
    expect(logs).toContain('parsed <input> as a file');
  });
});

describe('colors', () => {
  afterEach(() => useColors(false));

  it('should leave text alone unless colors are on', () => {
    expect(colors.green('x')).toEqual('x');
    useColors();
    expect(colors.green('x')).toEqual('\u001b[32mx\u001b[0m');
  });
});

describe('iter', () => {
  it('should map lazily', () => {
    const seen: number[] = [];
    const mapped = iter([1, 2, 3]).map((n) => {
      seen.push(n);
      return n * 10;
    });
    expect(seen).toEqual([]);
    expect(mapped.toArray()).toEqual([10, 20, 30]);
    expect(seen).toEqual([1, 2, 3]);
  });
});
