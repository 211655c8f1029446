import path from 'node:path';
import { USAGE } from '../cli/args';
import { clearConfigCache } from '../config/yaml-loader';
import { main } from '../index';

describe('main', () => {
  const originalRoot = process.env.CONFIG_ROOT;
  let errorSpy: jest.SpyInstance;
  let logSpy: jest.SpyInstance;

  beforeAll(() => {
    process.env.CONFIG_ROOT = path.resolve(__dirname, '../..', 'config');
    clearConfigCache();
  });

  afterAll(() => {
    if (originalRoot === undefined) {
      delete process.env.CONFIG_ROOT;
    } else {
      process.env.CONFIG_ROOT = originalRoot;
    }
    clearConfigCache();
  });

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should print usage for --help', async () => {
    expect(await main(['--help'])).toBe(0);
    expect(logSpy).toHaveBeenCalledWith(USAGE);
  });

  it('should exit with 2 on a usage error', async () => {
    expect(await main(['--domain', 'advertising', '--verbose'])).toBe(2);
    expect(errorSpy.mock.calls).toEqual([['❌ Unknown option --verbose\n'], [USAGE]]);
  });

  it('should exit with 2 on an inverted window', async () => {
    expect(await main(['--domain', 'advertising', '--from-date', '2024-02-01', '--to-date', '2024-01-01'])).toBe(2);
    expect(errorSpy).toHaveBeenCalledWith('❌ Window start 2024-02-01 is after its end 2024-01-01');
  });

  it('should exit with 1 for an unknown domain', async () => {
    expect(await main(['--domain', 'sports', '--dry-run'])).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringMatching(/^❌ Configuration error: Missing configuration file: .*sports/)
    );
  });

  it('should print the availability table for --dry-run', async () => {
    expect(await main(['--domain', 'advertising', '--dry-run'])).toBe(0);
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy.mock.calls[0][0]).toMatch(/^COLLECTOR +TYPE +AVAILABLE +KEY \/ REASON\n/);
  });
});
