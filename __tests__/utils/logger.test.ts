import { Logger } from '../../app/utils/logger.js';

function capture(level: 'debug' | 'info' = 'info'): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger({
    level,
    prefix: '[test]',
    timestamps: false,
    colors: false,
    write: (line) => lines.push(line),
  });
  return { logger, lines };
}

describe('Logger', () => {
  it('formats level, prefix and arguments on one line', () => {
    const { logger, lines } = capture();
    logger.info('wrote', 3, { chunk: 1 });
    expect(lines).toEqual(['[INFO] [test] wrote 3 {"chunk":1}\n']);
  });

  it('drops messages below the level', () => {
    const { logger, lines } = capture();
    logger.debug('hidden');
    logger.verbose('hidden');
    logger.warn('shown');
    expect(lines).toEqual(['[WARN] [test] shown\n']);
  });

  it('renders errors with their stack', () => {
    const { logger, lines } = capture();
    const err = new Error('broken pipe');
    logger.error(err);
    expect(lines).toEqual([`[ERROR] [test] ${err.stack}\n`]);
  });

  it('creates children that share the sink and extend the prefix', () => {
    const { logger, lines } = capture('debug');
    logger.child('[writer]').debug('flushed');
    expect(lines).toEqual(['[DEBUG] [test][writer] flushed\n']);
  });

  it('changes level at runtime', () => {
    const { logger, lines } = capture();
    logger.setLevel('error');
    logger.warn('hidden');
    expect(logger.getLevel()).toBe('error');
    expect(lines).toEqual([]);
  });
});
