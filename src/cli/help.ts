function formatHeader(version?: string): string {
  return version && version !== 'unknown' ? `everyfind v${version}` : 'everyfind';
}

const ROOT_HELP = (version?: string): string[] => [
  formatHeader(version),
  '',
  'Usage:',
  '  everyfind [search] <term...> [options]',
  '  everyfind help',
  '',
  'Options:',
  '  --regex            Treat the term as a regular expression.',
  '  --migemo           Expand romaji through the query dictionary (implies regex).',
  '  --plain            Match the words literally.',
  '  --offset <n>       First row to print (default: 0).',
  '  --limit <n>        Rows to print (default: 20).',
  '  --width <n>        Row width in cells; splits it between name and path.',
  '  --index <file>     Search a JSON index file instead of the Everything server.',
  '  --config <file>    Read settings from this file.',
  '  --no-color         Do not highlight matches.',
  '  -h, --help         Show help.',
  '  -v, --version      Show version.',
  '',
  'Environment:',
  '  EVERYFIND_EVERYTHING_URL  Everything HTTP server (default: http://127.0.0.1).',
  '  EVERYFIND_PAGE_SIZE       Records fetched per request (default: 100).',
  '  EVERYFIND_LOG_LEVEL       Minimum log level (default: Warning).',
  '',
  'Exit codes:',
  '  0  success',
  '  2  usage error',
  '  6  internal error',
];

export function formatHelp(version?: string): string {
  return ROOT_HELP(version).join('\n');
}
