import { describe, it, expect } from 'vitest';
import { ActionRegistry } from './action-registry.js';

describe('ActionRegistry', () => {
  it('resolves qualified and bare names', () => {
    const actions = new ActionRegistry();
    actions.register('spotify', [{ name: 'play' }, { name: 'pause', description: 'Pause playback' }]);

    expect(actions.resolveOwner('spotify.play')).toEqual({ integration: 'spotify', action: 'play' });
    expect(actions.resolveOwner('pause')).toEqual({ integration: 'spotify', action: 'pause' });
    expect(actions.resolveOwner('discord.play')).toBeUndefined();
    expect(actions.resolveOwner('skip')).toBeUndefined();
  });

  it('keeps dotted action names resolvable as bare names', () => {
    const actions = new ActionRegistry();
    actions.register('spotify', [{ name: 'queue.add' }]);
    expect(actions.resolveOwner('queue.add')).toEqual({ integration: 'spotify', action: 'queue.add' });
    expect(actions.resolveOwner('spotify.queue.add')).toEqual({ integration: 'spotify', action: 'queue.add' });
  });

  it('moves an action to the latest announcer', () => {
    const actions = new ActionRegistry();
    actions.register('spotify', [{ name: 'play' }]);
    actions.register('youtube', [{ name: 'play' }]);

    expect(actions.resolveOwner('play')).toEqual({ integration: 'youtube', action: 'play' });
    expect(actions.list('spotify')).toEqual([]);
    expect(actions.list().map(a => a.integration)).toEqual(['youtube']);
    expect(actions.size).toBe(1);
  });
});
