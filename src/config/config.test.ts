import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { buildCatalog, DEFAULT_SETTINGS, getGlobalConfigDir, loadConfig, parseConfigText } from './config.js';
import { computeFlags } from './flags.js';
import { validateConfig } from './schema.js';
import { charsetAt } from '../profile/index.js';
import { listProfiles } from '../engine/index.js';
import { ConfigurationError } from '../error.js';

describe('config', () => {
  describe('parseConfigText', () => {
    it('should accept comments and trailing commas', () => {
      const config = parseConfigText('{\n  // dictation by default\n  "profile": "simple",\n  "count": 3,\n}', 'config.jsonc');
      expect(config).toEqual({ profile: 'simple', count: 3 });
    });

    it('should treat an empty file as empty config', () => {
      expect(parseConfigText('', 'config.jsonc')).toEqual({});
    });

    it('should report JSON syntax errors with the file name', () => {
      expect(() => parseConfigText('{ "profile": }', 'broken.jsonc')).toThrow(
        /^Configuration error in broken\.jsonc: Invalid JSON:\nValueExpected at line 1, column 14/,
      );
    });

    it('should report schema errors by path', () => {
      expect(() => parseConfigText('{ "count": 0 }', 'c.json')).toThrow(
        'Configuration error in c.json:\n  - count: Number must be greater than or equal to 1',
      );
    });

    it('should reject unknown keys', () => {
      const result = validateConfig({ colour: true });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors).toEqual([{ path: '(root)', message: "Unrecognized key(s) in object: 'colour'" }]);
      }
    });
  });

  describe('buildCatalog', () => {
    it('should return the built-ins when no profiles are declared', () => {
      expect(buildCatalog({}).names()).toEqual(['default', 'simple', 'paranoid']);
    });

    it('should add custom profiles from literals', () => {
      const config = parseConfigText(
        '{ "profiles": { "hex": { "description": "hex", "charsets": [{ "chars": "0123456789abcdef" }], "separators": ["-"], "segments": 3 } } }',
        'config.jsonc',
      );
      const catalog = buildCatalog(config);
      const hex = catalog.get('hex');
      expect(catalog.names()).toEqual(['default', 'simple', 'paranoid', 'hex']);
      expect(hex.defaultSegments).toBe(3);
      expect(hex.defaultSegmentLength).toBe(4);
      expect(hex.wordSafe).toBe(false);
      expect(charsetAt(hex, 0).size).toBe(16);
    });

    it('should resolve registry charset names', () => {
      const catalog = buildCatalog({
        profiles: {
          pin: {
            description: 'alternating',
            charsets: ['LOWER_UNAMBIGUOUS', 'DIGIT_UNAMBIGUOUS'],
            separators: ['_'],
            wordSafe: true,
          },
        },
      });
      const pin = catalog.get('pin');
      expect(charsetAt(pin, 0).size).toBe(23);
      expect(charsetAt(pin, 1).size).toBe(8);
    });

    it('should reject dangerous literal charsets', () => {
      expect(() =>
        buildCatalog({ profiles: { shell: { description: '', charsets: [{ chars: 'ab$' }], separators: [], wordSafe: false } } }),
      ).toThrow('Charset for role "custom" contains dangerous characters: $');
    });

    it('should reject unknown charset names', () => {
      expect(() =>
        buildCatalog({ profiles: { typo: { description: '', charsets: ['LOWERCASE'], separators: [], wordSafe: false } } }),
      ).toThrow(
        'Unknown charset "LOWERCASE". Known charsets: UPPER, LOWER, DIGIT, UPPER_UNAMBIGUOUS, LOWER_UNAMBIGUOUS, DIGIT_UNAMBIGUOUS, SAFE_SEPARATORS, PARANOID_SYMBOLS',
      );
    });

    it('should reject invalid layouts in a profile', () => {
      expect(() =>
        parseConfigText('{ "profiles": { "bad": { "charsets": ["LOWER"], "segments": 0 } } }', 'c.json'),
      ).toThrow('Configuration error in c.json:\n  - profiles.bad.segments: Number must be greater than 0');
    });

    it('should reject a default layout over the length limit', () => {
      expect(() =>
        buildCatalog({
          profiles: { big: { description: '', charsets: ['LOWER'], separators: ['_'], segments: 2000, wordSafe: true } },
        }),
      ).toThrow('Profile "big" has a default layout of 2000 x 4 (9999 characters), the limit is 4096');
    });

    it('should keep every listed profile generatable', () => {
      const catalog = buildCatalog({
        profiles: { wide: { description: '', charsets: ['LOWER'], separators: ['_'], segments: 80, segmentLength: 50, wordSafe: true } },
      });
      expect(listProfiles(catalog).map(p => p.id)).toEqual(['default', 'simple', 'paranoid', 'wide']);
    });

    it('should reject a word-safe claim that does not hold', () => {
      expect(() =>
        buildCatalog({ profiles: { dashed: { description: '', charsets: ['LOWER'], separators: ['-'], wordSafe: true } } }),
      ).toThrow(ConfigurationError);
    });

    it('should not let a custom profile replace a built-in', () => {
      expect(() =>
        buildCatalog({ profiles: { simple: { description: '', charsets: ['LOWER'], separators: [], wordSafe: false } } }),
      ).toThrow('Duplicate profile id "simple"');
    });
  });

  describe('computeFlags', () => {
    it('should read GENPASSWORD_* variables', () => {
      const flags = computeFlags({ GENPASSWORD_NO_COPY: 'TRUE', GENPASSWORD_LOG_LEVEL: 'DEBUG', HOME: '/home/test' });
      expect(flags.GENPASSWORD_NO_COPY).toBe(true);
      expect(flags.GENPASSWORD_LOG_LEVEL).toBe('debug');
      expect(flags.HOME).toBe('/home/test');
    });

    it('should treat other values as false', () => {
      expect(computeFlags({ GENPASSWORD_NO_COPY: 'yes' }).GENPASSWORD_NO_COPY).toBe(false);
    });
  });

  describe('getGlobalConfigDir', () => {
    it('should prefer XDG_CONFIG_HOME', () => {
      expect(getGlobalConfigDir(computeFlags({ XDG_CONFIG_HOME: '/xdg', HOME: '/home/test' }))).toBe(
        path.join('/xdg', 'genpassword'),
      );
    });

    it('should use HOME when set', () => {
      expect(getGlobalConfigDir(computeFlags({ HOME: '/home/test' }))).toBe(
        path.join('/home/test', '.config', 'genpassword'),
      );
    });

    it('should fall back to the user home directory, never the working directory', () => {
      const dir = getGlobalConfigDir(computeFlags({}));
      expect(dir).toBe(path.join(os.homedir(), '.config', 'genpassword'));
      expect(path.isAbsolute(dir)).toBe(true);
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'genpassword-config-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should fall back to defaults without a file', async () => {
      const loaded = await loadConfig({ env: { XDG_CONFIG_HOME: dir } });
      expect(loaded.file).toBeUndefined();
      expect(loaded.searched).toEqual([
        path.join(dir, 'genpassword', 'config.jsonc'),
        path.join(dir, 'genpassword', 'config.json'),
      ]);
      expect(loaded.settings).toEqual(DEFAULT_SETTINGS);
    });

    it('should load the XDG config file', async () => {
      await fs.mkdir(path.join(dir, 'genpassword'));
      const file = path.join(dir, 'genpassword', 'config.jsonc');
      await fs.writeFile(file, '{ "profile": "paranoid", "copy": false, "logLevel": "info" }');

      const loaded = await loadConfig({ env: { XDG_CONFIG_HOME: dir } });
      expect(loaded.file).toBe(file);
      expect(loaded.settings).toEqual({ profile: 'paranoid', count: 1, copy: false, logLevel: 'info' });
    });

    it('should let the environment override the file', async () => {
      const file = path.join(dir, 'custom.json');
      await fs.writeFile(file, '{ "copy": true, "logLevel": "info" }');

      const loaded = await loadConfig({
        env: { GENPASSWORD_CONFIG: file, GENPASSWORD_NO_COPY: '1', GENPASSWORD_LOG_LEVEL: 'error' },
      });
      expect(loaded.settings.copy).toBe(false);
      expect(loaded.settings.logLevel).toBe('error');
    });

    it('should fail when an explicit file is missing', async () => {
      const file = path.join(dir, 'missing.json');
      await expect(loadConfig({ env: { GENPASSWORD_CONFIG: file } })).rejects.toThrow(
        `Config file not found: ${file} (from GENPASSWORD_CONFIG)`,
      );
    });
  });
});
