import { describe, it, expect } from 'vitest';

import { InMemoryCredentialStore } from './credential-store';

describe('InMemoryCredentialStore', () => {
  it('should return null for a judge the user never linked', async () => {
    const store = new InMemoryCredentialStore();
    expect(await store.get('u1', 'CodeForces')).toBeNull();
  });

  it('should overwrite the credential on re-link', async () => {
    const store = new InMemoryCredentialStore();
    await store.save('u1', 'CodeForces', 'alice', 'test-secret');
    await store.save('u1', 'CodeForces', 'alice2', 'test-secret-2');

    expect(await store.get('u1', 'CodeForces')).toEqual({
      judge: 'CodeForces',
      username: 'alice2',
      secret: 'test-secret-2',
    });
    expect(await store.listJudges('u1')).toHaveLength(1);
  });

  it('should keep credentials per user and per judge', async () => {
    const store = new InMemoryCredentialStore();
    await store.save('u1', 'CodeForces', 'alice', 'test-secret');
    await store.save('u1', 'AtCoder', 'alice_at', 'test-secret');
    await store.save('u2', 'CodeForces', 'bob', 'test-secret');

    const judges = await store.listJudges('u1');
    expect(judges.map((linked) => [linked.judge, linked.username])).toEqual([
      ['AtCoder', 'alice_at'],
      ['CodeForces', 'alice'],
    ]);
    expect(judges[0]).not.toHaveProperty('secret');
  });

  it('should unlink', async () => {
    const store = new InMemoryCredentialStore();
    await store.save('u1', 'CodeForces', 'alice', 'test-secret');

    expect(await store.remove('u1', 'CodeForces')).toBe(true);
    expect(await store.remove('u1', 'CodeForces')).toBe(false);
    expect(await store.get('u1', 'CodeForces')).toBeNull();
  });

  it('should remember the display name when one is given', async () => {
    const store = new InMemoryCredentialStore();
    await store.save('u1', 'CodeForces', 'alice', 'test-secret', 'Alice');
    await store.save('u1', 'AtCoder', 'alice', 'test-secret');

    expect(store.displayNames.get('u1')).toBe('Alice');
  });

  it('should replace the display name on setDisplayName', async () => {
    const store = new InMemoryCredentialStore();
    await store.save('u1', 'CodeForces', 'alice', 'test-secret', 'Alice');
    await store.setDisplayName('u1', 'Alice B.');

    expect(store.displayNames.get('u1')).toBe('Alice B.');
  });
});
