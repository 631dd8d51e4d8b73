import { z } from 'zod';
import { ConfigError } from './detection-utils';
import { DETECTOR_NAMES, resolveDetectorNames } from './detectors';

// ==========================================
// SCHEMA
// ==========================================

export const RunConfigSchema = z.object({
  inputPath: z.string().min(1).describe('Root directory to scan for images'),
  outputRoot: z
    .string()
    .min(1)
    .nullable()
    .describe('Mirror stats.csv files under this directory instead of writing beside the images'),
  detectors: z.array(z.enum(DETECTOR_NAMES)).min(1),
  recurse: z.boolean(),
  annotate: z.boolean().describe('Write <stem>__<Detector>.jpg with keypoints drawn'),
  dumpKeypoints: z.boolean().describe('Write <stem>__<Detector>_keypoints.csv'),
  concurrency: z.number().int().min(1).max(32),
  imageExtensions: z
    .array(z.string().regex(/^\.[a-z0-9]+$/, 'extensions look like .jpg'))
    .min(1),
  pathStyle: z.enum(['full', 'name']),
  verbose: z.boolean(),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

// ==========================================
// ENVIRONMENT DEFAULTS
// ==========================================

type Env = Record<string, string | undefined>;

function envFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return value === '1' || value === 'true' || value === 'yes';
}

export function parseExtensions(value: string): string[] {
  return value
    .split(',')
    .map((e) => e.trim().toLowerCase())
    .filter(Boolean)
    .map((e) => (e.startsWith('.') ? e : `.${e}`));
}

export type EnvDefaults = {
  detectors: string;
  recurse: boolean;
  annotate: boolean;
  dumpKeypoints: boolean;
  concurrency: number;
  imageExtensions: string[];
  outputRoot: string | null;
  pathStyle: string;
  verbose: boolean;
};

export function readEnvDefaults(env: Env = process.env): EnvDefaults {
  return {
    detectors: env.DETECTORS || 'all',
    recurse: envFlag(env.RECURSE, false),
    annotate: envFlag(env.ANNOTATE, false),
    dumpKeypoints: envFlag(env.DUMP_KEYPOINTS, false),
    concurrency: Number(env.CONCURRENCY || 1),
    imageExtensions: parseExtensions(env.IMAGE_EXTENSIONS || '.jpg'),
    outputRoot: env.OUTPUT_ROOT || null,
    pathStyle: env.PATH_STYLE || 'full',
    verbose: envFlag(env.VERBOSE, false),
  };
}

// ==========================================
// ARGUMENTS
// ==========================================

export const HELP_TEXT = `
Usage: npx tsx scripts/feature-stats.ts [options] <directory>

Runs keypoint detectors over every image in <directory> and writes a stats.csv
per directory with per-image rows and a <directory>/** aggregate row per detector.

Options:
  -d, --detector <sel>     Detector(s): ${DETECTOR_NAMES.join(', ')}, GFTT, a comma list, or all (default)
  -r, --recurse            Enter subdirectories, aggregating upward
      --no-recurse         Only process images directly in <directory>
  -a, --annotate           Draw keypoints into <stem>__<Detector>.jpg
      --no-annotate        Do not write annotated images (overrides ANNOTATE)
  -k, --keypoints          Write keypoints to <stem>__<Detector>_keypoints.csv
  -o, --output-root <dir>  Write outputs under <dir>, mirroring the input tree
      --ext <list>         Image extensions, comma separated (default: .jpg)
      --concurrency <n>    Images decoded and detected in parallel, 1-32 (default: 1)
      --path-style <s>     Per-image path column: full|name (default: full)
  -v, --verbose            Log every detector call
  -h, --help               Show help
`;

export type ParsedArgs = { help: true } | { help: false; config: RunConfig };

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (!value || value.startsWith('-')) {
    throw new ConfigError(`Missing value for ${flag}`);
  }
  return value;
}

export function parseArgs(argv: string[], env: Env = process.env): ParsedArgs {
  const defaults = readEnvDefaults(env);
  let detectorSelection = defaults.detectors;
  const draft = {
    inputPath: '',
    outputRoot: defaults.outputRoot,
    recurse: defaults.recurse,
    annotate: defaults.annotate,
    dumpKeypoints: defaults.dumpKeypoints,
    concurrency: defaults.concurrency,
    imageExtensions: defaults.imageExtensions,
    pathStyle: defaults.pathStyle,
    verbose: defaults.verbose,
  };
  const positionalArgs: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '-d':
      case '--detector':
        detectorSelection = requireValue(argv, i, arg);
        i++;
        break;
      case '-r':
      case '--recurse':
        draft.recurse = true;
        break;
      case '--no-recurse':
        draft.recurse = false;
        break;
      case '-a':
      case '--annotate':
        draft.annotate = true;
        break;
      case '--no-annotate':
        draft.annotate = false;
        break;
      case '-k':
      case '--keypoints':
        draft.dumpKeypoints = true;
        break;
      case '-o':
      case '--output-root':
        draft.outputRoot = requireValue(argv, i, arg);
        i++;
        break;
      case '--ext':
        draft.imageExtensions = parseExtensions(requireValue(argv, i, arg));
        i++;
        break;
      case '--concurrency': {
        const value = Number(requireValue(argv, i, arg));
        if (!Number.isInteger(value) || value < 1 || value > 32) {
          throw new ConfigError(`Invalid value for ${arg}: ${argv[i + 1]} (must be 1-32)`);
        }
        draft.concurrency = value;
        i++;
        break;
      }
      case '--path-style': {
        const value = requireValue(argv, i, arg);
        if (value !== 'full' && value !== 'name') {
          throw new ConfigError(`Invalid value for ${arg}: ${value} (must be full or name)`);
        }
        draft.pathStyle = value;
        i++;
        break;
      }
      case '-v':
      case '--verbose':
        draft.verbose = true;
        break;
      case '-h':
      case '--help':
        return { help: true };
      default:
        if (arg.startsWith('-')) {
          throw new ConfigError(`Unknown argument: ${arg}`);
        }
        positionalArgs.push(arg);
    }
  }

  if (positionalArgs.length !== 1) {
    throw new ConfigError(
      positionalArgs.length === 0
        ? 'No input directory specified.'
        : `Expected one input directory, got ${positionalArgs.length}`
    );
  }
  draft.inputPath = positionalArgs[0];

  const parsed = RunConfigSchema.safeParse({
    ...draft,
    detectors: resolveDetectorNames(detectorSelection),
  });
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return { help: false, config: parsed.data };
}
