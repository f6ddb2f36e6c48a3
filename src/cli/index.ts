import { Cause, Effect, Exit, Option } from 'effect';
import { AppConfig } from '../effect/Config';
import { IndexFileError } from '../effect/errors';
import { makeAppRuntime, runEffectExit } from '../effect/runtime';
import { SearchEvent, SearchSession, type SearchSessionShape } from '../effect/services';
import { measureWidth, terminalMeasure } from '../core/char-width';
import { formatHelp } from './help';
import { optionsForMode, parseCliArgs, type CliCommand, type SearchCommand } from './parse';
import { columnWidths, MODIFIED_WIDTH, renderRow, SIZE_WIDTH, type ColumnWidths } from './render';
import { getCliVersion } from './version';

const EXIT_SUCCESS = 0;
const EXIT_USAGE = 2;
const EXIT_INTERNAL = 6;

function printError(message: string): void {
  console.error(message);
}

const layoutRow = (session: SearchSessionShape, index: number, widths: ColumnWidths, ellipsisWidth: number) =>
  Effect.all({
    name: session.layoutCell(index, 'name', { widthBudget: widths.name, measure: terminalMeasure, ellipsisWidth }),
    path: session.layoutCell(index, 'path', { widthBudget: widths.path, measure: terminalMeasure, ellipsisWidth }),
    size: session.layoutCell(index, 'size', { widthBudget: widths.size, measure: terminalMeasure, ellipsisWidth }),
    modified: session.layoutCell(index, 'modified', {
      widthBudget: widths.modified,
      measure: terminalMeasure,
      ellipsisWidth,
    }),
  }).pipe(Effect.map((cells) => Option.all(cells)));

const searchProgram = (command: SearchCommand, color: boolean) =>
  Effect.gen(function* () {
    const config = yield* AppConfig;
    const session = yield* SearchSession;

    yield* session.dispatch(SearchEvent.InputChanged({ text: command.term }));
    yield* session.searchNow();
    const state = yield* session.state();

    const widths: ColumnWidths = command.width
      ? columnWidths(command.width)
      : { name: config.nameWidth, path: config.pathWidth, size: SIZE_WIDTH, modified: MODIFIED_WIDTH };
    const ellipsisWidth = measureWidth(terminalMeasure, config.ellipsis);

    const lines = [state.status];
    const end = Math.min(state.itemCount, command.offset + command.limit);
    for (let index = command.offset; index < end; index++) {
      const layouts = yield* layoutRow(session, index, widths, ellipsisWidth);
      if (Option.isNone(layouts)) break;
      lines.push(renderRow(layouts.value, { widths, ellipsis: config.ellipsis, ellipsisWidth, color }));
    }

    return { lines, failed: state.lastSearchFailed };
  });

function describeFailure(cause: Cause.Cause<unknown>): string {
  const failure = Cause.failureOption(cause);
  if (Option.isSome(failure) && failure.value instanceof IndexFileError) {
    const reason = failure.value.cause instanceof Error ? failure.value.cause.message : String(failure.value.cause);
    return `Cannot load index file ${failure.value.path}: ${reason}`;
  }
  return Cause.pretty(cause);
}

async function runSearch(command: SearchCommand): Promise<number> {
  const runtime = makeAppRuntime({
    indexFile: command.indexFile,
    configPath: command.configPath,
    searchOptions: command.mode ? optionsForMode(command.mode) : undefined,
  });
  const color = command.color && process.stdout.isTTY === true && !process.env.NO_COLOR;

  try {
    const exit = await runEffectExit(runtime, searchProgram(command, color));
    if (Exit.isFailure(exit)) {
      printError(describeFailure(exit.cause));
      return EXIT_INTERNAL;
    }

    console.log(exit.value.lines.join('\n'));
    if (exit.value.failed) {
      printError('Search failed; the provider did not answer.');
      return EXIT_INTERNAL;
    }
    return EXIT_SUCCESS;
  } finally {
    await runtime.dispose();
  }
}

export async function runCli(args: string[]): Promise<number> {
  const parsed = parseCliArgs(args);
  if (!parsed.ok) {
    printError(parsed.error);
    return EXIT_USAGE;
  }

  const command = parsed.command;

  switch (command.kind) {
    case 'help':
      console.log(formatHelp(getCliVersion()));
      return EXIT_SUCCESS;
    case 'version':
      console.log(getCliVersion());
      return EXIT_SUCCESS;
    case 'search':
      return runSearch(command);
  }
}

export type { CliCommand };
