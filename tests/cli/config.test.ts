import { describe, it, expect } from 'vitest';
import { envBool, resolveConfig } from '../../apps/cli/src/config.js';
import type { CliOptions } from '../../apps/cli/src/config.js';

const NOW = new Date(2026, 9, 18);
const defaults: CliOptions = { verbose: false, skipPm: false, skipBm: false };

describe('resolveConfig', () => {
  it('should resolve paths against the working directory and date the defaults', () => {
    const config = resolveConfig({ ...defaults, baseDir: 'in', pacFile: 'pac.xlsx' }, NOW, '/work');

    expect(config).toEqual({
      baseDir: '/work/in',
      lookupFile: '/work/pac.xlsx',
      outputDir: '/work/Out_Excel_Exports_20261018',
      logFile: '/work/reconcile_20261018.log',
      skipPm: false,
      skipBm: false,
      verbose: false,
      keyColumn: 'Kundenummer',
    });
  });

  it('should keep explicit options', () => {
    const config = resolveConfig(
      {
        verbose: true,
        skipPm: true,
        skipBm: false,
        baseDir: '/data/in',
        pacFile: '/data/pac.xlsx',
        outputDir: 'exports',
        logFile: '/var/log/recon.log',
        onlyBank: ' 1234 ',
        keyColumn: 'KundeId',
      },
      NOW,
      '/work'
    );

    expect(config.baseDir).toBe('/data/in');
    expect(config.outputDir).toBe('/work/exports');
    expect(config.logFile).toBe('/var/log/recon.log');
    expect(config.onlyBank).toBe('1234');
    expect(config.keyColumn).toBe('KundeId');
    expect(config.skipPm).toBe(true);
    expect(config.verbose).toBe(true);
  });

  it('should list every missing required path', () => {
    expect(() => resolveConfig({ ...defaults, baseDir: '  ' }, NOW, '/work')).toThrow(
      'Invalid configuration: baseDir: Base directory is required; lookupFile: PAC lookup file is required'
    );
  });

  it('should reject a malformed bank id', () => {
    expect(() =>
      resolveConfig({ ...defaults, baseDir: 'in', pacFile: 'pac.xlsx', onlyBank: '12a4' }, NOW, '/work')
    ).toThrow('Invalid configuration: onlyBank: Bank id must be 4 digits');
  });
});

describe('envBool', () => {
  it('should read true and 1 as true', () => {
    expect(envBool('RECON_VERBOSE', false, { RECON_VERBOSE: 'true' })).toBe(true);
    expect(envBool('RECON_VERBOSE', false, { RECON_VERBOSE: '1' })).toBe(true);
    expect(envBool('RECON_VERBOSE', true, { RECON_VERBOSE: 'no' })).toBe(false);
  });

  it('should fall back to the default when unset or empty', () => {
    expect(envBool('RECON_SKIP_PM', true, {})).toBe(true);
    expect(envBool('RECON_SKIP_PM', false, { RECON_SKIP_PM: '' })).toBe(false);
  });
});
