import type { FixtureEntry } from '@domain/types/fixture.js';

const FIXTURES: FixtureEntry[] = [
  {
    identity: 'metaqbxxUerdq28cj1RbAWkYQm3ybzjb6a8bt518x1s',
    fileName: 'mpl-token-metadata.so',
    method: 'program-dump',
    label: 'MPL Token Metadata program',
  },
  {
    identity: '6EF8rrecthR5Dkzon8Nwu78hRvfCKubJ14M5uBEwF6P',
    fileName: 'pumpfun.so',
    method: 'program-dump',
    label: 'Pump.fun program',
  },
  {
    identity: 'pAMMBay6oceH9fJKBRHGP5D4bD4sWpmSwMn52FMfXEA',
    fileName: 'pumpamm.so',
    method: 'program-dump',
    label: 'Pump.fun AMM program',
  },
  {
    identity: '4wTV1YmiEkRvAtNtsSGPtUrqRYQMe5SKy2uB4Jjaxnjf',
    fileName: '4wTV1YmiEkRvAtNtsSGPtUrqRYQMe5SKy2uB4Jjaxnjf.json',
    method: 'account-snapshot',
    label: 'Pump.fun global account',
  },
  {
    identity: 'ADyA8hdefvWN2dbGGWFotbzWxrAvLW83WG6QCVXvJKqw',
    fileName: 'ADyA8hdefvWN2dbGGWFotbzWxrAvLW83WG6QCVXvJKqw.json',
    method: 'account-snapshot',
    label: 'Pump.fun AMM global config account',
  },
];

/**
 * Built-in fixture table, in binding order. A `fixtures` array in
 * localnet.config.json replaces it entirely.
 */
export const DEFAULT_FIXTURES: readonly FixtureEntry[] = Object.freeze(FIXTURES);
