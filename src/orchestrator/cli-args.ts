import { CliUsageError } from '../shared/errors.js';

export interface CLIOptions {
  mode: string;
  experimentType: string;
  paramsPath?: string;
  savePath?: string;
  list: boolean;
  help: boolean;
}

export const USAGE = `Usage: bci-task [options]

Options:
  -m, --mode <mode>              Task mode (default: RSVP)
  -e, --experiment <type>        Experiment type, e.g. "Calibration" or "Copy Phrase"
  -p, --params <file>            JSON parameters file
  -s, --save <dir>               Directory for session output
  -l, --list                     List registered task types
  -h, --help                     Show this help`;

export function parseArgs(
  args: string[],
  defaults: { mode: string; experimentType: string }
): CLIOptions {
  const options: CLIOptions = {
    mode: defaults.mode,
    experimentType: defaults.experimentType,
    list: false,
    help: false,
  };

  const valueFor = (flag: string, index: number): string => {
    const value = args[index];
    if (value === undefined || value.startsWith('-')) {
      throw new CliUsageError(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--mode':
      case '-m':
        options.mode = valueFor(arg, ++i);
        break;

      case '--experiment':
      case '-e':
        options.experimentType = valueFor(arg, ++i);
        break;

      case '--params':
      case '-p':
        options.paramsPath = valueFor(arg, ++i);
        break;

      case '--save':
      case '-s':
        options.savePath = valueFor(arg, ++i);
        break;

      case '--list':
      case '-l':
        options.list = true;
        break;

      case '--help':
      case '-h':
        options.help = true;
        break;

      default:
        throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  return options;
}
