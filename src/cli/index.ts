import { resolve, join } from 'node:path';
import { mkdir, writeFile } from 'node:fs/promises';
import type { HighlightOrder } from '../types.js';
import { DEFAULT_MAX_HEADING_LEVEL } from '../types.js';
import { withKoboDatabase } from '../reader/database.js';
import { exportLibrary } from '../core/pipeline.js';
import { bookFileName, generateBookMarkdown } from '../shared/export.js';
import { LOG_PREFIX, errorMessage } from '../shared/errors.js';

export const USAGE = `Usage: kobo-highlights <KoboReader.sqlite> [options]

Export Kobo highlights and annotations to Markdown, one file per book.

Options:
  -o, --output-dir <dir>       Output directory (default: highlights)
      --order <created|position>
                               Order of highlights within a section (default: created)
      --max-heading-level <n>  Deepest heading level, 2-6 (default: 6)
  -h, --help                   Show this help`;

export interface CliOptions {
  dbPath: string;
  outputDir: string;
  order: HighlightOrder;
  maxHeadingLevel: number;
}

export type ParsedArgs =
  | { kind: 'run'; options: CliOptions }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

/** Parse `process.argv`-shaped arguments; paths are resolved against the cwd */
export function parseCliArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  let dbPath: string | undefined;
  let outputDir = 'highlights';
  let order: HighlightOrder = 'created';
  let maxHeadingLevel = DEFAULT_MAX_HEADING_LEVEL;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const takeValue = (): string | undefined => (i + 1 < args.length ? args[++i] : undefined);

    if (arg === '-h' || arg === '--help') return { kind: 'help' };

    if (arg === '-o' || arg === '--output-dir') {
      const value = takeValue();
      if (!value) return { kind: 'error', message: `${arg} needs a directory` };
      outputDir = value;
    } else if (arg === '--order') {
      const value = takeValue();
      if (value !== 'created' && value !== 'position') {
        return { kind: 'error', message: '--order must be "created" or "position"' };
      }
      order = value;
    } else if (arg === '--max-heading-level') {
      const value = Number(takeValue());
      if (!Number.isInteger(value) || value < 2 || value > 6) {
        return { kind: 'error', message: '--max-heading-level must be an integer from 2 to 6' };
      }
      maxHeadingLevel = value;
    } else if (arg.startsWith('-')) {
      return { kind: 'error', message: `Unknown option ${arg}` };
    } else if (dbPath === undefined) {
      dbPath = arg;
    } else {
      return { kind: 'error', message: `Unexpected argument ${arg}` };
    }
  }

  if (dbPath === undefined) return { kind: 'error', message: 'Missing path to KoboReader.sqlite' };

  return {
    kind: 'run',
    options: {
      dbPath: resolve(process.cwd(), dbPath),
      outputDir: resolve(process.cwd(), outputDir),
      order,
      maxHeadingLevel,
    },
  };
}

/** `Title.md`, then `Title (2).md`, `Title (3).md`, ... */
export function uniqueFileName(name: string, taken: Set<string>): string {
  const stem = name.replace(/\.md$/, '');
  let candidate = name;
  for (let n = 2; taken.has(candidate.toLowerCase()); n++) {
    candidate = `${stem} (${n}).md`;
  }
  taken.add(candidate.toLowerCase());
  return candidate;
}

/** Run the exporter and return the process exit code */
export async function run(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed.kind === 'help') {
    console.log(USAGE);
    return 0;
  }
  if (parsed.kind === 'error') {
    console.error(`${LOG_PREFIX} ${parsed.message}`);
    console.error(USAGE);
    return 2;
  }

  const { options } = parsed;
  try {
    const documents = withKoboDatabase(options.dbPath, db =>
      exportLibrary(db, options, books => console.log(`Found ${books.length} books in database`)),
    );

    await mkdir(options.outputDir, { recursive: true });

    const taken = new Set<string>();
    for (const document of documents) {
      const fileName = uniqueFileName(bookFileName(document.book), taken);
      await writeFile(join(options.outputDir, fileName), generateBookMarkdown(document), 'utf-8');
      console.log(`  Exported: ${document.book.title} (${document.highlightCount} highlights)`);
    }

    console.log(`Done. Exported ${documents.length} books to ${options.outputDir}`);
    return 0;
  } catch (err) {
    console.error(`${LOG_PREFIX} ${errorMessage(err)}`);
    return 1;
  }
}
