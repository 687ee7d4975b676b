import { parseArgs } from "util";
import { ConversionOptions, GeocodingProvider } from "./types";
import { DEFAULT_ADDRESS_COLUMN } from "./constants";
import { GeocoderConfig, loadConfig } from "./config";
import { UsageError } from "./errors";
import { createGeocoder, FetchLike } from "./services/nominatimService";
import { convertFile, validateConversionOptions } from "./services/converter";

export const USAGE = `Usage: csv-to-kml <input> [options]

Convert a CSV (or spreadsheet) file with addresses to KML format.

Options:
  -o, --output <path>          Output KML file (default: <input name>.kml)
  -a, --address-column <name>  Address column (default: ${DEFAULT_ADDRESS_COLUMN})
  -n, --name-column <name>     Column used for placemark names (default: address)
  -t, --title <text>           Document title (default: input file name)
      --skip-geocoding         Use latitude/longitude columns instead of geocoding
      --lat-column <name>      Latitude column (with --skip-geocoding)
      --lon-column <name>      Longitude column (with --skip-geocoding)
  -h, --help                   Show this help

Examples:
  csv-to-kml data.csv
  csv-to-kml data.csv -o output.kml
  csv-to-kml data.csv --skip-geocoding --lat-column Latitude --lon-column Longitude`;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliEnvironment {
  env?: NodeJS.ProcessEnv;
  fetchImpl?: FetchLike;
}

type ParsedCommand = { help: true } | { help: false; options: ConversionOptions };

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      output: { type: "string", short: "o" },
      "address-column": { type: "string", short: "a", default: DEFAULT_ADDRESS_COLUMN },
      "name-column": { type: "string", short: "n" },
      title: { type: "string", short: "t" },
      "skip-geocoding": { type: "boolean", default: false },
      "lat-column": { type: "string" },
      "lon-column": { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

export function parseCommandLine(argv: string[]): ParsedCommand {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }

  const { values, positionals } = parsed;
  if (values.help) {
    return { help: true };
  }

  if (positionals.length !== 1) {
    throw new UsageError(
      positionals.length === 0 ? "missing input file" : `unexpected argument '${positionals[1]}'`
    );
  }

  const options: ConversionOptions = {
    inputPath: positionals[0],
    outputPath: values.output,
    addressColumn: values["address-column"] ?? DEFAULT_ADDRESS_COLUMN,
    nameColumn: values["name-column"],
    documentName: values.title,
    skipGeocoding: values["skip-geocoding"] ?? false,
    latColumn: values["lat-column"],
    lonColumn: values["lon-column"],
  };
  validateConversionOptions(options);

  return { help: false, options };
}

/**
 * Runs the command and returns the process exit code. Usage errors are
 * reported before any file is touched.
 */
export async function runCli(argv: string[], environment: CliEnvironment = {}): Promise<number> {
  let options: ConversionOptions;
  let config: GeocoderConfig;
  let geocoder: GeocodingProvider;
  try {
    const command = parseCommandLine(argv);
    if (command.help) {
      console.log(USAGE);
      return EXIT_OK;
    }

    options = command.options;
    config = loadConfig(environment.env ?? process.env);
    geocoder = createGeocoder(config, environment.fetchImpl);
    if (!options.skipGeocoding && !geocoder.available) {
      throw new UsageError(
        "geocoding is disabled (GEOCODER_ENABLED); use --skip-geocoding with --lat-column and --lon-column"
      );
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    console.error(USAGE);
    return EXIT_USAGE;
  }

  try {
    const result = await convertFile(options, {
      geocoder,
      resolverOptions: { delayMs: config.delayMs, timeoutMs: config.timeoutMs },
    });
    console.log(`Conversion complete! KML file saved as: ${result.outputPath}`);
    return EXIT_OK;
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return EXIT_FAILURE;
  }
}
