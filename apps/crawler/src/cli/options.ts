/**
 * Command option schemas. Raw flags from parseFlags are validated here and
 * turned into the options each command runs with.
 */

import { z } from 'zod'
import { FatalConfigError, toFatalConfigError } from '../scraper/errors.js'
import { DETAIL_FIELDS, LISTING_FIELDS, type FieldName } from '../scraper/types.js'

export const RUN_DEFAULTS = {
  retries: 2,
  timeoutMs: 30000,
  concurrency: 4,
  graceMs: 5000,
  headless: true,
} as const

const TRUE_WORDS = ['true', '1', 'yes', 'on']
const FALSE_WORDS = ['false', '0', 'no', 'off']

const booleanFlag = z.union([z.boolean(), z.string()]).transform((value, ctx) => {
  if (typeof value === 'boolean') return value
  const word = value.trim().toLowerCase()
  if (TRUE_WORDS.includes(word)) return true
  if (FALSE_WORDS.includes(word)) return false
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected true or false, got "${value}"` })
  return z.NEVER
})

function wholeNumber(min: number) {
  return z
    .string({ invalid_type_error: 'expects a number' })
    .regex(/^\d+$/, 'must be a whole number')
    .transform(Number)
    .pipe(z.number().min(min, `must be at least ${min}`))
}

const pathFlag = z.string({ invalid_type_error: 'expects a path' }).min(1)

/** `host:port` is taken as an http proxy */
export function normalizeProxy(value: string): string {
  return value.includes('://') ? value : `http://${value}`
}

function isProxyUrl(value: string): boolean {
  try {
    const parsed = new URL(value)
    return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname !== ''
  } catch {
    return false
  }
}

const proxyFlag = z
  .string({ invalid_type_error: 'expects a proxy URI' })
  .transform(normalizeProxy)
  .refine(isProxyUrl, 'must be an http(s) proxy URI')

const commonFlags = {
  help: booleanFlag.optional(),
  headless: booleanFlag.optional(),
  proxy: proxyFlag.optional(),
  keywords: pathFlag.optional(),
  retries: wholeNumber(0).optional(),
  timeout: wholeNumber(1).optional(),
  grace: wholeNumber(0).optional(),
  progress: booleanFlag.optional(),
  all: booleanFlag.optional(),
  link: booleanFlag.optional(),
  kind: booleanFlag.optional(),
  title: booleanFlag.optional(),
  price: booleanFlag.optional(),
  location: booleanFlag.optional(),
}

export const listFlagsSchema = z
  .object({
    ...commonFlags,
    promoted: booleanFlag.optional(),
    free: booleanFlag.optional(),
    paid: booleanFlag.optional(),
    limit: wholeNumber(1).optional(),
    'max-pages': wholeNumber(1).optional(),
  })
  .strict()

export const detailFlagsSchema = z
  .object({
    ...commonFlags,
    description: booleanFlag.optional(),
    author: booleanFlag.optional(),
    profile: booleanFlag.optional(),
    concurrency: wholeNumber(1).optional(),
  })
  .strict()

const COMMON_BOOLEANS = ['help', 'headless', 'progress', 'all', 'link', 'kind', 'title', 'price', 'location']

/** Boolean flags per command, for parseFlags */
export const LIST_BOOLEAN_FLAGS: ReadonlySet<string> = new Set([...COMMON_BOOLEANS, 'promoted', 'free', 'paid'])
export const DETAIL_BOOLEAN_FLAGS: ReadonlySet<string> = new Set([
  ...COMMON_BOOLEANS,
  'description',
  'author',
  'profile',
])

export interface CommonOptions {
  headless: boolean
  proxy?: string
  keywords?: string
  retries: number
  timeoutMs: number
  graceMs: number
  progress: boolean
  /** Requested fields, widened by the keyword filter's fields */
  selection: Set<FieldName>
}

export interface ListOptions extends CommonOptions {
  includeRegular: boolean
  includePromoted: boolean
  limit?: number
  maxPages?: number
}

export interface DetailOptions extends CommonOptions {
  concurrency: number
}

type FieldFlags = Partial<Record<FieldName, boolean>>

/**
 * `link` is on unless turned off; other fields follow their own flag, then
 * `--all`. A keyword filter needs the fields it reads.
 */
export function buildSelection(
  available: readonly FieldName[],
  fieldFlags: FieldFlags,
  all: boolean,
  keywordFields: readonly FieldName[]
): Set<FieldName> {
  const selection = new Set<FieldName>()
  for (const field of available) {
    const chosen = fieldFlags[field] ?? (field === 'link' ? true : all)
    if (chosen) selection.add(field)
  }
  for (const field of keywordFields) {
    selection.add(field)
  }
  if (selection.size === 0) {
    throw new FatalConfigError('No fields selected')
  }
  return selection
}

interface CommonFlagValues {
  headless?: boolean
  proxy?: string
  keywords?: string
  retries?: number
  timeout?: number
  grace?: number
  progress?: boolean
}

function commonOptions(flags: CommonFlagValues, selection: Set<FieldName>): CommonOptions {
  return {
    headless: flags.headless ?? RUN_DEFAULTS.headless,
    proxy: flags.proxy,
    keywords: flags.keywords,
    retries: flags.retries ?? RUN_DEFAULTS.retries,
    timeoutMs: flags.timeout ?? RUN_DEFAULTS.timeoutMs,
    graceMs: flags.grace ?? RUN_DEFAULTS.graceMs,
    progress: flags.progress ?? false,
    selection,
  }
}

/**
 * @throws FatalConfigError on invalid flags
 */
export function parseListOptions(raw: Record<string, string | boolean>): ListOptions {
  const parsed = listFlagsSchema.safeParse(raw)
  if (!parsed.success) {
    throw toFatalConfigError(parsed.error)
  }
  const flags = parsed.data

  const includeRegular = flags.free ?? true
  const includePromoted = flags.paid ?? true
  if (!includeRegular && !includePromoted) {
    throw new FatalConfigError('--no-free and --no-paid together leave nothing to collect')
  }

  const selection = buildSelection(
    LISTING_FIELDS,
    {
      link: flags.link,
      kind: flags.kind,
      promoted: flags.promoted,
      title: flags.title,
      price: flags.price,
      location: flags.location,
    },
    flags.all ?? false,
    flags.keywords ? ['title'] : []
  )

  return {
    ...commonOptions(flags, selection),
    includeRegular,
    includePromoted,
    limit: flags.limit,
    maxPages: flags['max-pages'],
  }
}

/**
 * @throws FatalConfigError on invalid flags
 */
export function parseDetailOptions(raw: Record<string, string | boolean>): DetailOptions {
  const parsed = detailFlagsSchema.safeParse(raw)
  if (!parsed.success) {
    throw toFatalConfigError(parsed.error)
  }
  const flags = parsed.data

  const selection = buildSelection(
    DETAIL_FIELDS,
    {
      link: flags.link,
      kind: flags.kind,
      title: flags.title,
      price: flags.price,
      location: flags.location,
      description: flags.description,
      author: flags.author,
      profile: flags.profile,
    },
    flags.all ?? false,
    flags.keywords ? ['title', 'description'] : []
  )

  return {
    ...commonOptions(flags, selection),
    concurrency: flags.concurrency ?? RUN_DEFAULTS.concurrency,
  }
}
