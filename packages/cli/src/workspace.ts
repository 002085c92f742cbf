import { join } from 'node:path';
import { z } from 'zod';
import { loadConfig, getConfigPath, type Config } from '@semdrop/core';
import { Airdrop, JsonFileStore, StateSnapshotSchema } from '@semdrop/engine';
import { InMemoryTokenBank, TokenBankSnapshotSchema } from '@semdrop/token';
import {
  GroupRoots,
  GroupRootsSnapshotSchema,
  Groth16Verifier,
  type ProofVerifier,
} from '@semdrop/verifier';

export const WorkspaceStateSchema = z.object({
  airdrop: StateSnapshotSchema,
  tokens: TokenBankSnapshotSchema,
  groups: GroupRootsSnapshotSchema,
});

export type WorkspaceState = z.infer<typeof WorkspaceStateSchema>;

export interface Workspace {
  home: string;
  config: Config;
  airdrop: Airdrop;
  bank: InMemoryTokenBank;
  groups: GroupRoots;
  save(): Promise<void>;
}

export function getStatePath(home: string): string {
  return join(home, 'state.json');
}

export const NO_VERIFICATION_KEY = 'No verification key configured. Run "semdrop init --vkey <path>" first.';

function createVerifier(config: Config, groups: GroupRoots): ProofVerifier {
  const { verificationKeyPath } = config;
  if (verificationKeyPath) {
    return new Groth16Verifier({ groups, verificationKeyPath });
  }
  return {
    verify: async () => {
      throw new Error(NO_VERIFICATION_KEY);
    },
  };
}

/**
 * Load config and persisted state from the semdrop home directory.
 */
export async function openWorkspace(home: string): Promise<Workspace> {
  const config = await loadConfig(getConfigPath(home));
  const store = new JsonFileStore(getStatePath(home), WorkspaceStateSchema);
  const state = await store.load();

  const bank = state ? InMemoryTokenBank.from(state.tokens) : new InMemoryTokenBank();
  const groups = state ? GroupRoots.from(state.groups) : new GroupRoots();
  const deps = {
    contract: config.contract,
    verifier: createVerifier(config, groups),
    transfer: bank.adapterFor(config.contract),
  };
  const airdrop = state ? Airdrop.restore(state.airdrop, deps) : new Airdrop(deps);

  return {
    home,
    config,
    airdrop,
    bank,
    groups,
    save: async () => {
      await store.save({
        airdrop: await airdrop.snapshot(),
        tokens: bank.snapshot(),
        groups: groups.snapshot(),
      });
    },
  };
}
