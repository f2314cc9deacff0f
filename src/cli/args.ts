export interface CliArgs {
  db?: string
  reports?: string[]
  threshold?: number
  minPrice?: number
  changelog: boolean
  help: boolean
}

function parseNumber(flag: string, raw: string): number {
  const value = Number(raw)
  if (raw.trim() === '' || !Number.isFinite(value) || value < 0) {
    throw new Error(`${flag} expects a non-negative number, got "${raw}"`)
  }
  return value
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { changelog: false, help: false }

  for (const arg of argv) {
    if (arg.startsWith('--db=')) {
      args.db = arg.slice('--db='.length)
    } else if (arg.startsWith('--report=')) {
      args.reports = arg
        .slice('--report='.length)
        .split(',')
        .map((key) => key.trim())
        .filter((key) => key.length > 0)
    } else if (arg.startsWith('--threshold=')) {
      args.threshold = parseNumber('--threshold', arg.slice('--threshold='.length))
    } else if (arg.startsWith('--min-price=')) {
      args.minPrice = parseNumber('--min-price', arg.slice('--min-price='.length))
    } else if (arg === '--changelog') {
      args.changelog = true
    } else if (arg === '--help' || arg === '-h') {
      args.help = true
    } else {
      throw new Error(`Unknown argument "${arg}" (see --help)`)
    }
  }

  return args
}
