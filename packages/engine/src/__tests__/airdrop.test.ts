import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  InvalidAirdropError,
  InvalidNullifierError,
  InvalidProofError,
  TransferFailedError,
  UnauthorizedError,
  type Address,
} from '@semdrop/core';
import { InMemoryTokenBank } from '@semdrop/token';
import { Airdrop } from '../airdrop.js';
import type { AirdropEvent } from '../events.js';
import { IssuingVerifier, deferred, proveClaim } from './fakes.js';

const CONTRACT = '0x0000000000000000000000000000000000000099';
const TOKEN = '0x1000000000000000000000000000000000000001';
const MANAGER = '0x2000000000000000000000000000000000000002';
const HOLDER = '0x3000000000000000000000000000000000000003';
const RECEIVER = '0x4000000000000000000000000000000000000004';
const ATTACKER = '0x5000000000000000000000000000000000000005';

const ROOT = 777n;
const NULLIFIER = 4242n;

describe('Airdrop', () => {
  let verifier: IssuingVerifier;
  let bank: InMemoryTokenBank;
  let airdrop: Airdrop;
  let events: AirdropEvent[];

  beforeEach(() => {
    verifier = new IssuingVerifier();
    bank = new InMemoryTokenBank();
    airdrop = new Airdrop({ contract: CONTRACT, verifier, transfer: bank.adapterFor(CONTRACT) });
    events = [];
    airdrop.on((event) => events.push(event));
  });

  async function fundedAirdrop(amount = 5n): Promise<bigint> {
    const id = await airdrop.createAirdrop(MANAGER, { groupId: 1n, token: TOKEN, holder: HOLDER, amount });
    bank.mint(TOKEN, HOLDER, 100n);
    bank.approve(TOKEN, HOLDER, CONTRACT, 100n);
    return id;
  }

  function claimFor(
    airdropId: bigint,
    overrides: { nullifierHash?: bigint; receiver?: Address; groupId?: bigint } = {}
  ) {
    return proveClaim(verifier, {
      contract: CONTRACT,
      airdropId,
      groupId: overrides.groupId ?? 1n,
      root: ROOT,
      nullifierHash: overrides.nullifierHash ?? NULLIFIER,
      receiver: overrides.receiver ?? RECEIVER,
    });
  }

  describe('createAirdrop', () => {
    it('returns the counter value and advances it by one', async () => {
      for (let expected = 1n; expected <= 3n; expected++) {
        const before = airdrop.nextId;
        const id = await airdrop.createAirdrop(MANAGER, { groupId: 1n, token: TOKEN, holder: HOLDER, amount: 5n });
        expect(id).toBe(before);
        expect(id).toBe(expected);
        expect(airdrop.nextId).toBe(id + 1n);
      }
    });

    it('never hands out the same id to concurrent creates', async () => {
      const ids = await Promise.all(
        Array.from({ length: 10 }, () =>
          airdrop.createAirdrop(MANAGER, { groupId: 1n, token: TOKEN, holder: HOLDER, amount: 1n })
        )
      );
      expect(new Set(ids).size).toBe(10);
      expect(airdrop.nextId).toBe(11n);
    });

    it('emits AirdropCreated with the full record', async () => {
      const id = await airdrop.createAirdrop(MANAGER, { groupId: '3', token: TOKEN, holder: HOLDER, amount: 5 });

      expect(events).toEqual([
        {
          type: 'AirdropCreated',
          airdropId: id,
          airdrop: { groupId: 3n, token: TOKEN, manager: MANAGER, holder: HOLDER, amount: 5n },
        },
      ]);
    });

    it('validates inputs before touching state', async () => {
      await expect(
        airdrop.createAirdrop('0x12', { groupId: 1n, token: TOKEN, holder: HOLDER, amount: 5n })
      ).rejects.toThrow('Invalid address');
      expect(airdrop.nextId).toBe(1n);
    });
  });

  describe('claim', () => {
    it('pays the receiver, marks the nullifier and emits AirdropClaimed', async () => {
      const id = await fundedAirdrop();
      events.length = 0;

      const receipt = await airdrop.claim(claimFor(id));

      expect(receipt).toEqual({
        airdropId: 1n,
        receiver: RECEIVER,
        token: TOKEN,
        holder: HOLDER,
        amount: 5n,
        nullifierHash: NULLIFIER,
      });
      expect(bank.balanceOf(TOKEN, HOLDER)).toBe(95n);
      expect(bank.balanceOf(TOKEN, RECEIVER)).toBe(5n);
      expect(airdrop.isNullifierUsed(NULLIFIER)).toBe(true);
      expect(events).toEqual([{ type: 'AirdropClaimed', airdropId: 1n, receiver: RECEIVER }]);
    });

    it('rejects a replay and leaves balances unchanged', async () => {
      const id = await fundedAirdrop();
      const request = claimFor(id);
      await airdrop.claim(request);

      await expect(airdrop.claim(request)).rejects.toBeInstanceOf(InvalidNullifierError);
      expect(bank.balanceOf(TOKEN, HOLDER)).toBe(95n);
      expect(bank.balanceOf(TOKEN, RECEIVER)).toBe(5n);
    });

    it('rejects a used nullifier on every other airdrop too', async () => {
      const first = await fundedAirdrop();
      const second = await fundedAirdrop();
      await airdrop.claim(claimFor(first));

      await expect(airdrop.claim(claimFor(second))).rejects.toBeInstanceOf(InvalidNullifierError);
    });

    it('lets one identity claim each airdrop once with scoped nullifiers', async () => {
      const first = await fundedAirdrop();
      const second = await fundedAirdrop();

      await airdrop.claim(claimFor(first, { nullifierHash: 1n }));
      await airdrop.claim(claimFor(second, { nullifierHash: 2n }));

      expect(bank.balanceOf(TOKEN, RECEIVER)).toBe(10n);
    });

    it('rejects a proof replayed with a different receiver', async () => {
      const id = await fundedAirdrop();
      const request = { ...claimFor(id), receiver: ATTACKER };

      await expect(airdrop.claim(request)).rejects.toBeInstanceOf(InvalidProofError);
      expect(airdrop.isNullifierUsed(NULLIFIER)).toBe(false);
      expect(bank.balanceOf(TOKEN, ATTACKER)).toBe(0n);
      expect(bank.balanceOf(TOKEN, HOLDER)).toBe(100n);
    });

    it('rejects a proof made for another airdrop', async () => {
      const first = await fundedAirdrop();
      const second = await fundedAirdrop();
      const request = { ...claimFor(first), airdropId: second };

      await expect(airdrop.claim(request)).rejects.toBeInstanceOf(InvalidProofError);
    });

    it('rejects id 0 and ids at or beyond the counter before verifying', async () => {
      await fundedAirdrop();

      await expect(airdrop.claim(claimFor(0n))).rejects.toBeInstanceOf(InvalidAirdropError);
      await expect(airdrop.claim(claimFor(2n))).rejects.toThrow('Airdrop 2 does not exist');
      await expect(airdrop.claim(claimFor(99n))).rejects.toBeInstanceOf(InvalidAirdropError);
      expect(verifier.calls).toBe(0);
    });

    it('checks the nullifier before looking up the airdrop', async () => {
      const id = await fundedAirdrop();
      await airdrop.claim(claimFor(id));

      await expect(airdrop.claim(claimFor(0n))).rejects.toBeInstanceOf(InvalidNullifierError);
    });

    it('rolls back the nullifier when the transfer fails', async () => {
      const id = await airdrop.createAirdrop(MANAGER, { groupId: 1n, token: TOKEN, holder: HOLDER, amount: 5n });
      bank.mint(TOKEN, HOLDER, 100n);
      events.length = 0;
      const request = claimFor(id);

      await expect(airdrop.claim(request)).rejects.toBeInstanceOf(TransferFailedError);
      expect(airdrop.isNullifierUsed(NULLIFIER)).toBe(false);
      expect(events).toEqual([]);

      bank.approve(TOKEN, HOLDER, CONTRACT, 5n);
      await airdrop.claim(request);
      expect(bank.balanceOf(TOKEN, RECEIVER)).toBe(5n);
    });

    it('lets exactly one of two concurrent claims with one nullifier win', async () => {
      const id = await fundedAirdrop();
      const other = '0x6000000000000000000000000000000000000006';

      const results = await Promise.allSettled([
        airdrop.claim(claimFor(id)),
        airdrop.claim(claimFor(id, { receiver: other })),
      ]);

      expect(results[0]?.status).toBe('fulfilled');
      expect(results[1]?.status).toBe('rejected');
      if (results[1]?.status === 'rejected') {
        expect(results[1].reason).toBeInstanceOf(InvalidNullifierError);
      }
      expect(bank.balanceOf(TOKEN, HOLDER)).toBe(95n);
      expect(bank.balanceOf(TOKEN, other)).toBe(0n);
    });

    it('pays from one record snapshot when an update races the claim', async () => {
      const id = await fundedAirdrop();
      const gate = deferred();
      verifier.gate = gate.promise;

      const claim = airdrop.claim(claimFor(id));
      const update = airdrop.updateDetails(MANAGER, id, {
        groupId: 1n,
        token: TOKEN,
        manager: MANAGER,
        holder: HOLDER,
        amount: 9n,
      });
      gate.resolve();

      await expect(claim).resolves.toMatchObject({ amount: 5n });
      await expect(update).resolves.toMatchObject({ amount: 9n });
      expect(bank.balanceOf(TOKEN, RECEIVER)).toBe(5n);
      expect(airdrop.getAirdrop(id)?.amount).toBe(9n);
    });

    it('validates field elements before touching state', async () => {
      const id = await fundedAirdrop();
      await expect(airdrop.claim({ ...claimFor(id), nullifierHash: -1n })).rejects.toThrow();
      expect(verifier.calls).toBe(0);
    });
  });

  describe('updateDetails', () => {
    const newRecord = {
      groupId: 2n,
      token: TOKEN,
      manager: MANAGER,
      holder: '0x7000000000000000000000000000000000000007',
      amount: 12n,
    } as const;

    it('only lets the manager replace the record', async () => {
      const id = await fundedAirdrop();

      await expect(airdrop.updateDetails(ATTACKER, id, newRecord)).rejects.toBeInstanceOf(UnauthorizedError);
      await expect(airdrop.updateDetails(HOLDER, id, newRecord)).rejects.toBeInstanceOf(UnauthorizedError);

      await airdrop.updateDetails(MANAGER, id, newRecord);
      expect(airdrop.getAirdrop(id)).toEqual(newRecord);
    });

    it('emits AirdropUpdated', async () => {
      const id = await fundedAirdrop();
      events.length = 0;
      await airdrop.updateDetails(MANAGER, id, newRecord);

      expect(events).toEqual([{ type: 'AirdropUpdated', airdropId: id, airdrop: newRecord }]);
    });

    it('fails Unauthorized for airdrops that do not exist', async () => {
      await expect(airdrop.updateDetails(MANAGER, 1n, newRecord)).rejects.toBeInstanceOf(UnauthorizedError);
      expect(airdrop.getAirdrop(1n)).toBeUndefined();
    });

    it('applies a group change to later claims', async () => {
      const id = await fundedAirdrop();
      await airdrop.updateDetails(MANAGER, id, { ...newRecord, holder: HOLDER });

      await expect(airdrop.claim(claimFor(id))).rejects.toBeInstanceOf(InvalidProofError);
      await expect(airdrop.claim(claimFor(id, { groupId: 2n }))).resolves.toMatchObject({ amount: 12n });
    });
  });

  describe('events', () => {
    it('logs and skips a failing listener', async () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      airdrop.on(() => {
        throw new Error('listener broke');
      });

      const id = await fundedAirdrop();
      expect(id).toBe(1n);
      expect(events).toHaveLength(1);
      expect(errorSpy).toHaveBeenCalledWith('Listener for AirdropCreated failed:', new Error('listener broke'));
      errorSpy.mockRestore();
    });

    it('stops delivering after unsubscribe', async () => {
      const seen: AirdropEvent[] = [];
      const off = airdrop.on((event) => seen.push(event));
      off();
      await fundedAirdrop();
      expect(seen).toEqual([]);
    });
  });

  describe('snapshot', () => {
    it('restores registry, counter and used nullifiers', async () => {
      const id = await fundedAirdrop();
      await airdrop.claim(claimFor(id));

      const snapshot = await airdrop.snapshot();
      expect(snapshot).toEqual({
        version: 1,
        nextId: '2',
        airdrops: [
          { id: '1', groupId: '1', token: TOKEN, manager: MANAGER, holder: HOLDER, amount: '5' },
        ],
        nullifiers: ['4242'],
      });

      const restored = Airdrop.restore(snapshot, {
        contract: CONTRACT,
        verifier,
        transfer: bank.adapterFor(CONTRACT),
      });
      expect(restored.nextId).toBe(2n);
      expect(restored.getAirdrop(1n)).toEqual(airdrop.getAirdrop(1n));
      await expect(restored.claim(claimFor(id))).rejects.toBeInstanceOf(InvalidNullifierError);
    });
  });
});
