/**
 * outline-porter CLI - command definition.
 *
 * Settings are layered: built-in defaults, then the JSON config file
 * (`--config`), then flags given on the command line. Invalid values are
 * logged as warnings and replaced by the layer below.
 */
import { Command } from 'commander';

import packageJson from '../../package.json';
import { BULLET_SYMBOLS, DEFAULT_SETTINGS, INDENT_SIZES, parseSettings } from '../config';
import { convertWithMetadata } from '../converter';
import { SOURCE_KINDS, TARGET_KINDS, type KindInfo } from '../core/kinds';
import type { ConversionSettings } from '../core/types';
import { ConfigFileError, InputReadError, OutputWriteError, errorReason } from '../errors';
import { LogLevel, logger, setLogLevel } from '../utils/logger';
import type { CliIo } from './io';

/** Parsed command-line flags, keyed as commander stores them. */
export type CliFlags = {
  source?: string;
  target?: string;
  indentSize?: number;
  bullet?: string;
  collapseBlankLines: boolean;
  trim: boolean;
  keepCodeFences: boolean;
  chatWrap: boolean;
  smartQuotes: boolean;
  config?: string;
  output?: string;
  listKinds: boolean;
  verbose: boolean;
  silent: boolean;
};

/** Flag name (as commander stores it) to the setting it controls. */
const FLAG_TO_SETTING: ReadonlyArray<[keyof CliFlags, keyof ConversionSettings]> = [
  ['source', 'source'],
  ['target', 'target'],
  ['indentSize', 'indentSize'],
  ['bullet', 'documentBulletSymbol'],
  ['collapseBlankLines', 'collapseBlankLines'],
  ['trim', 'trimTrailingWhitespace'],
  ['keepCodeFences', 'keepCodeFences'],
  ['chatWrap', 'chatWrapCodeblock'],
  ['smartQuotes', 'convertSmartQuotes'],
];

/**
 * Collect the settings given explicitly on the command line.
 *
 * Negatable flags always carry a value; only those the user actually typed
 * may override the config file.
 */
function collectFlagSettings(command: Command): Record<string, unknown> {
  const flags = command.opts<CliFlags>();
  const collected: Record<string, unknown> = {};
  for (const [flag, setting] of FLAG_TO_SETTING) {
    if (command.getOptionValueSource(flag) === 'cli') {
      collected[setting] = flags[flag];
    }
  }
  return collected;
}

function applySettings(
  raw: unknown,
  base: Readonly<ConversionSettings>,
  origin: string,
): ConversionSettings {
  const { settings, warnings } = parseSettings(raw, base);
  for (const warning of warnings) {
    logger.warn(`${origin}: ${warning}`);
  }
  return settings;
}

async function loadConfigFile(path: string, io: CliIo): Promise<unknown> {
  let content: string;
  try {
    content = await io.readFile(path);
  } catch (err) {
    throw new ConfigFileError(path, errorReason(err));
  }
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new ConfigFileError(path, errorReason(err));
  }
}

async function readInput(input: string | undefined, io: CliIo): Promise<string> {
  if (input === undefined || input === '-') {
    return io.readStdin();
  }
  try {
    return await io.readFile(input);
  } catch (err) {
    throw new InputReadError(input, errorReason(err));
  }
}

function formatKindTable<K extends string>(title: string, kinds: Record<K, KindInfo<K>>): string {
  const entries: KindInfo<K>[] = Object.values(kinds);
  const width = Math.max(...entries.map((kind) => kind.name.length));
  const rows = entries.map(
    (kind) => `  ${kind.name.padEnd(width)}  ${kind.label}: ${kind.description}`,
  );
  return [`${title}:`, ...rows].join('\n');
}

/**
 * Human-readable list of every source and target kind.
 */
export function formatKinds(): string {
  return `${formatKindTable('Sources', SOURCE_KINDS)}\n\n${formatKindTable('Targets', TARGET_KINDS)}\n`;
}

/**
 * Build the `outline-porter` command over the given I/O.
 *
 * Errors from reading or writing files reject the `parseAsync` promise;
 * the entry point decides how to report them.
 */
export function createProgram(io: CliIo): Command {
  const program = new Command();

  program
    .name('outline-porter')
    .description('Reformat indented outline text for Slack, Google Docs, Markdown editors or JSON')
    .version(packageJson.version)
    .argument('[input]', 'input file; reads stdin when omitted or "-"')
    .option('-s, --source <kind>', `paste origin (default: ${DEFAULT_SETTINGS.source})`)
    .option('-t, --target <kind>', `output convention (default: ${DEFAULT_SETTINGS.target})`)
    .option(
      '-i, --indent-size <columns>',
      `spaces per level and tab width: ${INDENT_SIZES.join(', ')}`,
      (value: string) => Number.parseInt(value, 10),
    )
    .option('--bullet <symbol>', `document-bullet glyph: ${BULLET_SYMBOLS.join(' or ')}`)
    .option('--no-collapse-blank-lines', 'keep runs of blank lines')
    .option('--no-trim', 'keep trailing whitespace')
    .option('--no-keep-code-fences', 'reformat ``` blocks like any other text')
    .option('--no-chat-wrap', 'do not wrap chat-safe output in ```')
    .option('--no-smart-quotes', 'keep typographic quotes')
    .option('-c, --config <path>', 'JSON file with default settings')
    .option('-o, --output <path>', 'write to a file instead of stdout')
    .option('--list-kinds', 'list source and target kinds, then exit', false)
    .option('--verbose', 'enable debug logging', false)
    .option('--silent', 'log errors only', false)
    .action(async (input: string | undefined, _options: CliFlags, command: Command) => {
      const flags = command.opts<CliFlags>();
      if (flags.verbose) {
        setLogLevel(LogLevel.DEBUG);
      } else if (flags.silent) {
        setLogLevel(LogLevel.ERROR);
      }

      if (flags.listKinds) {
        io.writeStdout(formatKinds());
        return;
      }

      let settings: ConversionSettings = { ...DEFAULT_SETTINGS };
      if (flags.config !== undefined) {
        settings = applySettings(await loadConfigFile(flags.config, io), settings, flags.config);
      }
      settings = applySettings(collectFlagSettings(command), settings, 'command line');

      const text = await readInput(input, io);
      const { output, metadata } = convertWithMetadata({ ...settings, text });
      logger.debug(
        `${metadata.source} -> ${metadata.target}: ${metadata.itemCount} items, ` +
          `max level ${metadata.maxLevel}, ${metadata.codeBlockCount} code blocks`,
      );

      if (flags.output === undefined) {
        io.writeStdout(output);
        return;
      }
      try {
        await io.writeFile(flags.output, output);
      } catch (err) {
        throw new OutputWriteError(flags.output, errorReason(err));
      }
      logger.info(`Wrote ${flags.output}`);
    });

  return program;
}
