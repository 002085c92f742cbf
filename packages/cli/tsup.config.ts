import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  clean: true,
  noExternal: [
    '@semdrop/core',
    '@semdrop/verifier',
    '@semdrop/ledger',
    '@semdrop/registry',
    '@semdrop/token',
    '@semdrop/engine',
    '@semdrop/gateway',
  ],
  // snarkjs is loaded lazily and stays a runtime dependency
  external: ['snarkjs'],
});
