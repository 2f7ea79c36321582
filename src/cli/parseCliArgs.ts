import { GenerationOptionsInput } from '../domain/entities/Thumbnail';
import { ValidationError } from '../domain/errors/ThumbnailErrors';

export interface CliArgs {
    topics: string[];
    file?: string;
    options: GenerationOptionsInput;
    help: boolean;
}

const OPTION_FLAGS: Record<string, keyof GenerationOptionsInput> = {
    '--aspect-ratio': 'aspect_ratio',
    '--style': 'style',
    '--quality': 'quality',
};

export const USAGE = `Usage: course-thumbnails [options] <topic...>
       course-thumbnails [options] --file <path>

Options:
  --file <path>           Read topics from a file (one per line) instead of arguments
  --aspect-ratio <ratio>  Aspect ratio, e.g. 16:9
  --style <style>         Visual style, e.g. cinematic
  --quality <level>       low | medium | high
  -h, --help              Show this help`;

/**
 * Parses argv (without the node and script entries).
 * Flags accept both "--flag value" and "--flag=value"; a following token that
 * starts with "-" is never taken as a value. Topic arguments and --file are
 * mutually exclusive.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
    const args: CliArgs = { topics: [], options: {}, help: false };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (arg === '-h' || arg === '--help') {
            args.help = true;
            continue;
        }

        if (!arg.startsWith('--')) {
            args.topics.push(arg);
            continue;
        }

        const eq = arg.indexOf('=');
        const flag = eq === -1 ? arg : arg.substring(0, eq);
        let value: string | undefined;
        if (eq !== -1) {
            value = arg.substring(eq + 1);
        } else if (i + 1 < argv.length && !argv[i + 1].startsWith('-')) {
            value = argv[i + 1];
            i++;
        }
        if (!value) {
            throw new ValidationError(`Missing value for ${flag}`);
        }

        if (flag === '--file') {
            args.file = value;
            continue;
        }

        const optionKey = OPTION_FLAGS[flag];
        if (!optionKey) {
            throw new ValidationError(`Unknown option: ${flag}`);
        }
        args.options[optionKey] = value;
    }

    if (args.file && args.topics.length > 0) {
        throw new ValidationError('Give topics either as arguments or with --file, not both');
    }

    return args;
}
