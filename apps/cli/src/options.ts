import { parseArgs } from 'node:util';
import { z } from 'zod';

import { CliError, UsageError } from './errors';

export const USAGE = `Usage: pdftoc <input> [options]

Infer a PDF's table of contents from font sizes and write it as bookmarks.

Options:
  -o, --output <file>   Output PDF path (default: <input>_toc.pdf)
      --preview         Print the detected TOC to stdout without writing a file
      --max-level <n>   Maximum heading depth to include
      --replace         Overwrite the input file instead of creating a new one
      --debug           Print font histogram and detection details to stderr
      --edit            Review the detected TOC in $VISUAL/$EDITOR before writing
      --toc <file>      Import the TOC from a text file instead of detecting it
  -h, --help            Show this help
`;

const ARG_OPTIONS = {
  output: { type: 'string', short: 'o' },
  preview: { type: 'boolean', default: false },
  'max-level': { type: 'string' },
  replace: { type: 'boolean', default: false },
  debug: { type: 'boolean', default: false },
  edit: { type: 'boolean', default: false },
  toc: { type: 'string' },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

const MAX_LEVEL_MESSAGE = '--max-level must be a positive integer';

const cliOptionsSchema = z
  .object({
    input: z.string().min(1, 'missing input PDF'),
    output: z.string().min(1, '--output needs a path').optional(),
    preview: z.boolean(),
    maxLevel: z
      .string()
      .regex(/^\d+$/, MAX_LEVEL_MESSAGE)
      .transform(Number)
      .pipe(z.number().int().positive(MAX_LEVEL_MESSAGE))
      .optional(),
    replace: z.boolean(),
    debug: z.boolean(),
    edit: z.boolean(),
    toc: z.string().min(1, '--toc needs a path').optional(),
  })
  .superRefine((options, ctx) => {
    if (options.edit && options.toc !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: '--edit and --toc are mutually exclusive',
      });
    } else if (options.preview && (options.edit || options.toc !== undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `--preview and ${options.edit ? '--edit' : '--toc'} are mutually exclusive`,
      });
    }
    if (options.replace && options.output !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: '--replace and --output are mutually exclusive',
      });
    }
  });

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export type CliCommand = { kind: 'help' } | { kind: 'run'; options: CliOptions };

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: ARG_OPTIONS,
      allowPositionals: true,
    });
  } catch (error) {
    throw new UsageError(CliError.getErrorMessage(error), { cause: error });
  }
}

/**
 * Parse and validate command-line arguments (without the node and script
 * entries of process.argv)
 *
 * @throws {UsageError} On unknown flags, a missing or extra input, an invalid
 * `--max-level` or conflicting flags
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = readArgs(argv);

  if (values.help) {
    return { kind: 'help' };
  }
  if (positionals.length > 1) {
    throw new UsageError(`Unexpected argument: ${positionals[1]}`);
  }

  const result = cliOptionsSchema.safeParse({
    input: positionals[0] ?? '',
    output: values.output,
    preview: values.preview,
    maxLevel: values['max-level'],
    replace: values.replace,
    debug: values.debug,
    edit: values.edit,
    toc: values.toc,
  });

  if (!result.success) {
    throw new UsageError(
      result.error.issues.map((issue) => issue.message).join('; '),
    );
  }

  return { kind: 'run', options: result.data };
}
