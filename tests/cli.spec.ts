import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, USAGE, parseCommandLine, runCli } from '../src/cli';
import type { FetchLike } from '../src/services/nominatimService';

describe('CLI', () => {
  let dir: string;
  let log: MockInstance;
  let error: MockInstance;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cli-'));
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    error = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe('parseCommandLine', () => {
    it('should apply defaults', () => {
      expect(parseCommandLine(['places.csv'])).toEqual({
        help: false,
        options: {
          inputPath: 'places.csv',
          outputPath: undefined,
          addressColumn: 'Address',
          nameColumn: undefined,
          documentName: undefined,
          skipGeocoding: false,
          latColumn: undefined,
          lonColumn: undefined,
        },
      });
    });

    it('should read short and long options', () => {
      const command = parseCommandLine(['places.csv', '-o', 'out.kml', '-a', 'Street', '--name-column', 'Label']);
      expect(command).toMatchObject({
        help: false,
        options: { outputPath: 'out.kml', addressColumn: 'Street', nameColumn: 'Label' },
      });
    });

    it('should reject a second positional argument', () => {
      expect(() => parseCommandLine(['a.csv', 'b.csv'])).toThrow("unexpected argument 'b.csv'");
    });
  });

  describe('runCli', () => {
    it('should print usage for --help', async () => {
      expect(await runCli(['--help'])).toBe(EXIT_OK);
      expect(log).toHaveBeenCalledWith(USAGE);
    });

    it('should exit with a usage error when the input is missing', async () => {
      expect(await runCli([])).toBe(EXIT_USAGE);
      expect(error).toHaveBeenCalledWith('Error: missing input file');
    });

    it('should exit with a usage error on unknown options', async () => {
      expect(await runCli(['places.csv', '--bogus'])).toBe(EXIT_USAGE);
    });

    it('should require coordinate columns with --skip-geocoding', async () => {
      expect(await runCli(['places.csv', '--skip-geocoding', '--lat-column', 'Lat'])).toBe(EXIT_USAGE);
      expect(error).toHaveBeenCalledWith(
        'Error: --lat-column and --lon-column are required when --skip-geocoding is used'
      );
    });

    it('should refuse to geocode when geocoding is disabled', async () => {
      const code = await runCli(['places.csv'], { env: { GEOCODER_ENABLED: 'false' } });
      expect(code).toBe(EXIT_USAGE);
    });

    it('should report invalid configuration as a usage error', async () => {
      const code = await runCli(['places.csv'], { env: { GEOCODER_TIMEOUT_MS: '-5' } });
      expect(code).toBe(EXIT_USAGE);
    });

    it('should fail when the input file does not exist', async () => {
      const inputPath = join(dir, 'missing.csv');
      const code = await runCli([inputPath, '--skip-geocoding', '--lat-column', 'Lat', '--lon-column', 'Lon'], {
        env: {},
      });

      expect(code).toBe(EXIT_FAILURE);
      expect(error).toHaveBeenCalledWith(`Error: Input file not found: ${inputPath}`);
    });

    it('should convert coordinate columns without touching the network', async () => {
      const inputPath = join(dir, 'points.csv');
      const outputPath = join(dir, 'points.kml');
      await writeFile(inputPath, 'Lat,Lon,Name\n10.0,20.0,X\n', 'utf8');
      const fetchImpl = vi.fn(async (..._args: Parameters<FetchLike>) => new Response('[]'));

      const code = await runCli(
        [inputPath, '-o', outputPath, '--skip-geocoding', '--lat-column', 'Lat', '--lon-column', 'Lon'],
        { env: { GEOCODER_ENABLED: 'false' }, fetchImpl }
      );

      expect(code).toBe(EXIT_OK);
      expect(fetchImpl).not.toHaveBeenCalled();
      expect(await readFile(outputPath, 'utf8')).toContain('<coordinates>20,10,0</coordinates>');
      expect(log).toHaveBeenCalledWith(`Conversion complete! KML file saved as: ${outputPath}`);
    });

    it('should geocode addresses through the configured endpoint', async () => {
      const inputPath = join(dir, 'shops.csv');
      const outputPath = join(dir, 'shops.kml');
      await writeFile(inputPath, 'Address,Name\n1 Main St,Bob\n', 'utf8');
      const fetchImpl = vi.fn(
        async (..._args: Parameters<FetchLike>) => new Response(JSON.stringify([{ lat: '42.36', lon: '-71.05' }]))
      );

      const code = await runCli([inputPath, '--output', outputPath, '--title', 'Shops'], {
        env: { GEOCODER_DELAY_MS: '0', NOMINATIM_BASE_URL: 'http://geocoder.test/search' },
        fetchImpl,
      });

      expect(code).toBe(EXIT_OK);
      expect(fetchImpl).toHaveBeenCalledTimes(1);
      expect(String(fetchImpl.mock.calls[0][0])).toBe('http://geocoder.test/search?q=1+Main+St&format=json&limit=1');
      const kml = await readFile(outputPath, 'utf8');
      expect(kml).toContain('<name>Shops</name>');
      expect(kml).toContain('<coordinates>-71.05,42.36,0</coordinates>');
    });
  });
});
