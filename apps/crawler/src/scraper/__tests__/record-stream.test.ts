import { PassThrough, Readable, Writable } from 'node:stream'
import { describe, expect, it } from 'vitest'
import { FatalConfigError } from '../errors.js'
import {
  deserializeRecords,
  formatPrice,
  parseHeader,
  parsePriceCell,
  serializeRecords,
} from '../stream/codec.js'
import { openRecordSource, urlSource } from '../stream/reader.js'
import { RecordWriter } from '../stream/writer.js'
import { FIELD_NAMES, type AdDetail } from '../types.js'

function collect(output: PassThrough): () => string {
  const chunks: string[] = []
  output.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')))
  return () => chunks.join('')
}

async function drain<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = []
  for await (const item of items) {
    out.push(item)
  }
  return out
}

describe('price cells', () => {
  it('formats free, plain and negotiable prices', () => {
    expect(formatPrice({ amount: 0, negotiable: false, free: true })).toBe('free')
    expect(formatPrice({ amount: 1200, currency: 'UAH', negotiable: false, free: false })).toBe('1200 UAH')
    expect(formatPrice({ amount: 99.5, negotiable: true, free: false })).toBe('99.5 negotiable')
    expect(formatPrice({ amount: 5000, currency: 'USD', negotiable: true, free: false })).toBe('5000 USD negotiable')
  })

  it('parses what it formats and rejects anything else', () => {
    expect(parsePriceCell('5000 USD negotiable')).toEqual({
      amount: 5000,
      currency: 'USD',
      negotiable: true,
      free: false,
    })
    expect(parsePriceCell('free')).toEqual({ amount: 0, negotiable: false, free: true })
    expect(parsePriceCell('cheap')).toBeUndefined()
    expect(parsePriceCell('')).toBeUndefined()
  })
})

describe('parseHeader', () => {
  it('recognizes a header made of field names', () => {
    expect(parseHeader('link,title,price')).toEqual(['link', 'title', 'price'])
  })

  it('treats a URL line as data', () => {
    expect(parseHeader('https://market.test/d/ad.html')).toBeUndefined()
  })
})

describe('serializeRecords / deserializeRecords', () => {
  const records: AdDetail[] = [
    {
      link: 'https://market.test/d/a.html',
      kind: 'sale',
      promoted: true,
      title: 'Sofa, "like new"',
      price: { amount: 4500, currency: 'UAH', negotiable: true, free: false },
      location: 'Київ',
      description: 'Three seats<br>Grey',
      author: 'Ivan',
      profile: 'https://market.test/user/ivan',
    },
    { link: 'https://market.test/d/b.html', promoted: false, price: { amount: 0, negotiable: false, free: true } },
    { link: 'https://market.test/d/c.html', title: 'Lamp' },
  ]

  it('writes a header and one line per record in canonical column order', () => {
    const text = serializeRecords(records, ['title', 'link', 'promoted'])

    expect(text.split('\n')).toEqual([
      'link,promoted,title',
      'https://market.test/d/a.html,true,"Sofa, ""like new"""',
      'https://market.test/d/b.html,false,',
      'https://market.test/d/c.html,,Lamp',
      '',
    ])
  })

  it('reads back the records it wrote', () => {
    const text = serializeRecords(records, FIELD_NAMES)

    expect(deserializeRecords(text)).toEqual({ fields: [...FIELD_NAMES], records })
  })

  it('keeps Unicode line and paragraph separators', () => {
    const separated: AdDetail[] = [{ link: 'https://market.test/d/x.html', title: 'a\u2028b', description: 'c\u2029d' }]
    const text = serializeRecords(separated, ['link', 'title', 'description'])

    expect(deserializeRecords(text).records).toEqual(separated)
  })

  it('replaces line terminators inside values with a space', () => {
    const text = serializeRecords([{ link: 'https://market.test/d/x.html', title: 'Two\nlines\r\nhere' }], [
      'link',
      'title',
    ])

    expect(text).toBe('link,title\nhttps://market.test/d/x.html,Two lines here\n')
  })
})

describe('RecordWriter', () => {
  it('writes the header once, then each record', async () => {
    const output = new PassThrough()
    const read = collect(output)
    const writer = new RecordWriter(output, ['link', 'price'])

    await writer.writeHeader()
    await writer.write({ link: 'https://market.test/d/a.html', price: { amount: 10, currency: 'EUR', negotiable: false, free: false } })
    await writer.write({ link: 'https://market.test/d/b.html' })
    await new Promise(resolve => setImmediate(resolve))

    expect(read()).toBe('link,price\nhttps://market.test/d/a.html,10 EUR\nhttps://market.test/d/b.html,\n')
    expect(writer.recordsWritten).toBe(2)
  })

  it('waits for drain when the output pushes back', async () => {
    const lines: string[] = []
    const output = new Writable({
      highWaterMark: 1,
      write(chunk: Buffer, _encoding, callback) {
        lines.push(chunk.toString('utf8'))
        setTimeout(callback, 1)
      },
    })
    const writer = new RecordWriter(output, ['link'])

    for (const id of ['a', 'b', 'c']) {
      await writer.write({ link: `https://market.test/d/${id}.html` })
    }

    expect(lines).toEqual([
      'link\n',
      'https://market.test/d/a.html\n',
      'https://market.test/d/b.html\n',
      'https://market.test/d/c.html\n',
    ])
  })

  it('drops records once the output has failed', async () => {
    const output = new PassThrough()
    const errors: string[] = []
    const writer = new RecordWriter(output, ['link'], error => errors.push(error.message))

    output.destroy(new Error('EPIPE'))
    await new Promise(resolve => setImmediate(resolve))
    await writer.write({ link: 'https://market.test/d/a.html' })

    expect(errors).toEqual(['EPIPE'])
    expect(writer.failed).toBe(true)
    expect(writer.dropped).toBe(1)
    expect(writer.recordsWritten).toBe(0)
  })
})

describe('openRecordSource', () => {
  it('reads a plain URL list, skipping blanks, invalid lines and repeats', async () => {
    const input = Readable.from([
      'https://market.test/d/a.html\n\nnot a url\n',
      'https://market.test/d/b.html?utm_source=feed\nhttps://market.test/d/a.html\n',
    ])

    const source = await openRecordSource(input)
    const items = await drain(source.items)

    expect(source.gathered.size).toBe(0)
    expect(items).toEqual([
      { link: 'https://market.test/d/a.html', record: undefined, gathered: source.gathered },
      { link: 'https://market.test/d/b.html', record: undefined, gathered: source.gathered },
    ])
    expect(source.stats).toEqual({ lines: 4, invalid: 1, duplicates: 1 })
  })

  it('reads a record stream and reports the upstream columns', async () => {
    const input = Readable.from(['link,promoted,title,price\n', 'https://market.test/d/a.html,true,Sofa,4500 UAH\n'])

    const source = await openRecordSource(input)
    const items = await drain(source.items)

    expect([...source.gathered]).toEqual(['link', 'promoted', 'title', 'price'])
    expect(items).toHaveLength(1)
    expect(items[0].record).toEqual({
      link: 'https://market.test/d/a.html',
      promoted: true,
      title: 'Sofa',
      price: { amount: 4500, currency: 'UAH', negotiable: false, free: false },
    })
  })

  it('skips a row that does not parse and keeps reading', async () => {
    const input = Readable.from([
      'link,title\n',
      'https://market.test/d/a.html,A\n',
      '"https://market.test/d/b.html,B\n',
      'https://market.test/d/c.html,C\n',
    ])

    const source = await openRecordSource(input)
    const items = await drain(source.items)

    expect(items.map(item => item.link)).toEqual(['https://market.test/d/a.html', 'https://market.test/d/c.html'])
    expect(source.stats).toEqual({ lines: 3, invalid: 1, duplicates: 0 })
  })

  it('counts an unparseable first line of a URL list as invalid', async () => {
    const input = Readable.from(['"https://market.test/d/a.html\n', 'https://market.test/d/b.html\n'])

    const source = await openRecordSource(input)
    const items = await drain(source.items)

    expect(source.gathered.size).toBe(0)
    expect(items.map(item => item.link)).toEqual(['https://market.test/d/b.html'])
    expect(source.stats).toEqual({ lines: 2, invalid: 1, duplicates: 0 })
  })

  it('ignores a byte order mark before the header', async () => {
    const input = Readable.from(['\uFEFFlink,title\n', 'https://market.test/d/a.html,Sofa\n'])

    const source = await openRecordSource(input)
    const items = await drain(source.items)

    expect([...source.gathered]).toEqual(['link', 'title'])
    expect(items.map(item => item.record)).toEqual([{ link: 'https://market.test/d/a.html', title: 'Sofa' }])
  })

  it('rejects a header without a link column', async () => {
    const input = Readable.from(['title,price\n', 'Sofa,4500 UAH\n'])

    await expect(openRecordSource(input)).rejects.toBeInstanceOf(FatalConfigError)
  })

  it('stops reading once the signal aborts', async () => {
    const input = new PassThrough()
    const controller = new AbortController()
    input.write('https://market.test/d/a.html\n')

    const source = await openRecordSource(input, { signal: controller.signal })
    const items: string[] = []
    for await (const item of source.items) {
      items.push(item.link)
      controller.abort()
    }

    expect(items).toEqual(['https://market.test/d/a.html'])
  })
})

describe('urlSource', () => {
  it('canonicalizes and deduplicates command-line URLs', async () => {
    const source = urlSource(['https://market.test/d/a.html#top', 'https://market.test/d/a.html'])

    expect((await drain(source.items)).map(item => item.link)).toEqual(['https://market.test/d/a.html'])
    expect(source.stats.duplicates).toBe(1)
  })
})
