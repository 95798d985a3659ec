import { setLogSink } from '@adsift/logger'

function blockedNetwork(): never {
  throw new Error('Outbound network is disabled for crawler tests')
}

// Tests that exercise HttpFetcher stub fetch themselves
globalThis.fetch = async () => blockedNetwork()

setLogSink(() => undefined)
