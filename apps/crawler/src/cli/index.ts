import { runDetailCommand } from './commands/detail.js'
import { runListCommand } from './commands/list.js'
import { DETAIL_BOOLEAN_FLAGS, LIST_BOOLEAN_FLAGS } from './options.js'
import { parseFlags } from './parse-flags.js'
import type { CommandIO } from './runtime.js'

const USAGE = `Usage: adsift <command> [options]

Commands:
  list [<start-url>...]   Walk listing pages and write one record per ad
  detail [<url>...]       Read ad pages (URLs or a list record stream on stdin)

Run "adsift <command> --help" for the options of a command.
`

const SHARED_HELP = `
Shared options:
  --keywords <path>        Keep only ads whose text contains a keyword (one per line)
  --proxy <uri>            Send requests through an http(s) proxy
  --headless=true|false    Rendering mode (only headless is supported)
  --retries <n>            Retries after the first attempt (default: 2)
  --timeout <ms>           Per-attempt timeout (default: 30000)
  --grace <ms>             Time in-flight fetches get after an interrupt (default: 5000)
  --progress               Print a progress line on stderr
  --all                    Collect every field
  --link=true|false        Collect the ad link (default: true)
`

const LIST_HELP = `Usage: adsift list [<start-url>...] [options]

Start URLs are read from stdin, one per line, when none is given.

Fields:
  --kind --promoted --title --price --location

Options:
  --no-free                Skip regular ads
  --no-paid                Skip promoted ads
  --limit <n>              Stop after n records
  --max-pages <n>          Visit at most n pages per start URL
${SHARED_HELP}`

const DETAIL_HELP = `Usage: adsift detail [<url>...] [options]

Ad URLs, or the record stream written by "adsift list", are read from stdin
when no URL is given. Fields already present upstream are not fetched again.

Fields:
  --kind --title --description --author --profile --price --location

Options:
  --concurrency <n>        Ad pages fetched at once (default: 4)
${SHARED_HELP}`

/**
 * Run one command and return its exit code.
 */
export async function main(argv: string[], io: CommandIO): Promise<number> {
  const [command, ...rest] = argv
  if (command === '--help' || command === '-h' || command === 'help') {
    io.stdout.write(USAGE)
    return 0
  }

  switch (command) {
    case 'list': {
      const args = parseFlags(rest, { booleans: LIST_BOOLEAN_FLAGS })
      if (args.flags.help === true) {
        io.stdout.write(LIST_HELP)
        return 0
      }
      return runListCommand(args, io)
    }
    case 'detail': {
      const args = parseFlags(rest, { booleans: DETAIL_BOOLEAN_FLAGS })
      if (args.flags.help === true) {
        io.stdout.write(DETAIL_HELP)
        return 0
      }
      return runDetailCommand(args, io)
    }
    default:
      if (command) {
        io.stderr.write(`Unknown command: ${command}\n`)
      }
      io.stderr.write(USAGE)
      return 2
  }
}
