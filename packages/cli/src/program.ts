import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { ZodError } from 'zod';
import {
  AddressSchema,
  FieldElementSchema,
  UintSchema,
  getConfigPath,
  getHomeDir,
  saveConfig,
  serializeRecord,
} from '@semdrop/core';
import { startGateway } from '@semdrop/gateway';
import { ProofSchema } from '@semdrop/verifier';
import { NO_VERIFICATION_KEY, openWorkspace, type Workspace } from './workspace.js';

export interface ProgramOptions {
  /** Overrides $SEMDROP_HOME / ~/.semdrop */
  home?: string;
}

function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
  }
  return error instanceof Error ? error.message : String(error);
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function buildProgram(options: ProgramOptions = {}): Command {
  const program = new Command();
  const home = (): string => options.home ?? getHomeDir();

  // Every command reports failures the same way and exits non-zero
  const run =
    <A extends unknown[]>(fn: (...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      try {
        await fn(...args);
      } catch (error) {
        console.error(`Error: ${describeError(error)}`);
        process.exitCode = 1;
      }
    };

  const withWorkspace = async (fn: (workspace: Workspace) => Promise<void>): Promise<void> => {
    await fn(await openWorkspace(home()));
  };

  program
    .name('semdrop')
    .description('Anonymous group airdrops claimed with zero-knowledge membership proofs')
    .version('0.1.0');

  program
    .command('init')
    .description('Write config.json for this deployment')
    .requiredOption('--contract <address>', 'Address of this deployment, scopes every nullifier')
    .option('--vkey <path>', 'Groth16 verification key (JSON)')
    .option('--port <port>', 'Gateway port')
    .option('--audit-log <path>', 'Append claim attempts to this JSON-lines file')
    .action(
      run(async (opts: { contract: string; vkey?: string; port?: string; auditLog?: string }) => {
        const path = getConfigPath(home());
        const config = await saveConfig(
          {
            contract: opts.contract,
            verificationKeyPath: opts.vkey,
            port: opts.port === undefined ? undefined : Number(opts.port),
            auditLogPath: opts.auditLog,
          },
          path
        );
        console.log(`Wrote ${path}`);
        printJson(config);
      })
    );

  program
    .command('create')
    .description('Register a new airdrop managed by the caller')
    .requiredOption('--caller <address>', 'Creator, becomes the manager')
    .requiredOption('--group <id>', 'Membership group id')
    .requiredOption('--token <address>', 'Token to pay out')
    .requiredOption('--holder <address>', 'Account that funds claims')
    .requiredOption('--amount <amount>', 'Amount paid per claim')
    .action(
      run(async (opts: { caller: string; group: string; token: string; holder: string; amount: string }) =>
        withWorkspace(async ({ airdrop, save }) => {
          const id = await airdrop.createAirdrop(opts.caller, {
            groupId: opts.group,
            token: opts.token,
            holder: opts.holder,
            amount: opts.amount,
          });
          await save();
          printJson({ success: true, id: id.toString() });
        })
      )
    );

  program
    .command('get')
    .description('Show an airdrop')
    .argument('<id>', 'Airdrop id')
    .option('--json', 'Output as JSON')
    .action(
      run(async (id: string, opts: { json?: boolean }) =>
        withWorkspace(async ({ airdrop }) => {
          const record = airdrop.getAirdrop(id);
          if (!record) {
            throw new Error(`Airdrop not found: ${id}`);
          }

          const serialized = serializeRecord(record);
          if (opts.json) {
            printJson({ id, ...serialized });
            return;
          }
          console.log(`Airdrop ${id}`);
          console.log(`  Group:   ${serialized.groupId}`);
          console.log(`  Token:   ${serialized.token}`);
          console.log(`  Manager: ${serialized.manager}`);
          console.log(`  Holder:  ${serialized.holder}`);
          console.log(`  Amount:  ${serialized.amount}`);
        })
      )
    );

  program
    .command('update')
    .description('Replace an airdrop record (manager only)')
    .argument('<id>', 'Airdrop id')
    .requiredOption('--caller <address>', 'Must be the current manager')
    .requiredOption('--group <id>', 'Membership group id')
    .requiredOption('--token <address>', 'Token to pay out')
    .requiredOption('--manager <address>', 'Manager after the update')
    .requiredOption('--holder <address>', 'Account that funds claims')
    .requiredOption('--amount <amount>', 'Amount paid per claim')
    .action(
      run(
        async (
          id: string,
          opts: { caller: string; group: string; token: string; manager: string; holder: string; amount: string }
        ) =>
          withWorkspace(async ({ airdrop, save }) => {
            const record = await airdrop.updateDetails(opts.caller, id, {
              groupId: opts.group,
              token: opts.token,
              manager: opts.manager,
              holder: opts.holder,
              amount: opts.amount,
            });
            await save();
            printJson({ success: true, id, ...serializeRecord(record) });
          })
      )
    );

  program
    .command('claim')
    .description('Claim an airdrop with a membership proof')
    .argument('<id>', 'Airdrop id')
    .requiredOption('--receiver <address>', 'Address that receives the tokens')
    .requiredOption('--root <root>', 'Group Merkle root the proof was made against')
    .requiredOption('--nullifier <hash>', 'Nullifier hash from the proof')
    .requiredOption('--proof <file>', 'snarkjs Groth16 proof (JSON)')
    .action(
      run(async (id: string, opts: { receiver: string; root: string; nullifier: string; proof: string }) =>
        withWorkspace(async ({ airdrop, save }) => {
          const proof = ProofSchema.parse(JSON.parse(await readFile(opts.proof, 'utf8')));
          const receipt = await airdrop.claim({
            airdropId: id,
            receiver: opts.receiver,
            root: opts.root,
            nullifierHash: opts.nullifier,
            proof,
          });
          await save();
          printJson({
            success: true,
            airdropId: receipt.airdropId.toString(),
            receiver: receipt.receiver,
            amount: receipt.amount.toString(),
          });
        })
      )
    );

  const rootsCmd = program.command('roots').description('Manage accepted group roots');

  rootsCmd
    .command('add')
    .description('Accept a Merkle root for a group')
    .requiredOption('--group <id>', 'Membership group id')
    .requiredOption('--root <root>', 'Merkle root')
    .action(
      run(async (opts: { group: string; root: string }) =>
        withWorkspace(async ({ groups, save }) => {
          const groupId = UintSchema.parse(opts.group);
          const root = FieldElementSchema.parse(opts.root);
          groups.addRoot(groupId, root);
          await save();
          console.log(`Added root ${root} to group ${groupId}`);
        })
      )
    );

  rootsCmd
    .command('list')
    .description('List accepted roots of a group')
    .requiredOption('--group <id>', 'Membership group id')
    .action(
      run(async (opts: { group: string }) =>
        withWorkspace(async ({ groups }) => {
          const groupId = UintSchema.parse(opts.group);
          const roots = groups.roots(groupId);
          if (roots.length === 0) {
            console.log(`No roots for group ${groupId}.`);
            return;
          }
          for (const root of roots) {
            console.log(root.toString());
          }
        })
      )
    );

  const tokenCmd = program.command('token').description('Manage balances in the local token bank');

  tokenCmd
    .command('mint')
    .description('Credit tokens to an account')
    .requiredOption('--token <address>', 'Token')
    .requiredOption('--to <address>', 'Account to credit')
    .requiredOption('--amount <amount>', 'Amount')
    .action(
      run(async (opts: { token: string; to: string; amount: string }) =>
        withWorkspace(async ({ bank, save }) => {
          const token = AddressSchema.parse(opts.token);
          const to = AddressSchema.parse(opts.to);
          bank.mint(token, to, UintSchema.parse(opts.amount));
          await save();
          console.log(`Balance of ${to}: ${bank.balanceOf(token, to)}`);
        })
      )
    );

  tokenCmd
    .command('approve')
    .description('Allow this deployment to pay claims from an account')
    .requiredOption('--token <address>', 'Token')
    .requiredOption('--owner <address>', 'Account granting the allowance')
    .requiredOption('--amount <amount>', 'Allowance')
    .action(
      run(async (opts: { token: string; owner: string; amount: string }) =>
        withWorkspace(async ({ bank, config, save }) => {
          const token = AddressSchema.parse(opts.token);
          const owner = AddressSchema.parse(opts.owner);
          bank.approve(token, owner, config.contract, UintSchema.parse(opts.amount));
          await save();
          console.log(`Allowance of ${config.contract} on ${owner}: ${bank.allowance(token, owner, config.contract)}`);
        })
      )
    );

  tokenCmd
    .command('balance')
    .description('Show a token balance')
    .requiredOption('--token <address>', 'Token')
    .requiredOption('--owner <address>', 'Account')
    .action(
      run(async (opts: { token: string; owner: string }) =>
        withWorkspace(async ({ bank }) => {
          const token = AddressSchema.parse(opts.token);
          const owner = AddressSchema.parse(opts.owner);
          console.log(bank.balanceOf(token, owner).toString());
        })
      )
    );

  program
    .command('status')
    .description('Show deployment status')
    .option('--json', 'Output as JSON')
    .action(
      run(async (opts: { json?: boolean }) =>
        withWorkspace(async ({ airdrop, config }) => {
          const snapshot = await airdrop.snapshot();
          const status = {
            contract: config.contract,
            nextId: snapshot.nextId,
            airdrops: snapshot.airdrops.length,
            nullifiersUsed: snapshot.nullifiers.length,
            verificationKey: config.verificationKeyPath ?? null,
            port: config.port,
          };
          if (opts.json) {
            printJson(status);
            return;
          }
          console.log(`Contract:         ${status.contract}`);
          console.log(`Airdrops:         ${status.airdrops} (next id ${status.nextId})`);
          console.log(`Nullifiers used:  ${status.nullifiersUsed}`);
          console.log(`Verification key: ${status.verificationKey ?? 'not configured'}`);
          console.log(`Gateway port:     ${status.port}`);
        })
      )
    );

  program
    .command('serve')
    .description('Run the JSON-RPC WebSocket gateway')
    .option('--port <port>', 'Port to listen on (defaults to config)')
    .option('--host <host>', 'Interface to bind')
    .action(
      run(async (opts: { port?: string; host?: string }) =>
        withWorkspace(async ({ airdrop, config, save }) => {
          if (!config.verificationKeyPath) {
            throw new Error(`${NO_VERIFICATION_KEY} The gateway needs one to accept claims.`);
          }
          await startGateway({
            airdrop,
            port: opts.port === undefined ? config.port : Number(opts.port),
            host: opts.host,
            auditLogPath: config.auditLogPath,
            onCommit: save,
          });
        })
      )
    );

  return program;
}
