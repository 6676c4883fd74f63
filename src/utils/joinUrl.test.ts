import { describe, expect, it } from 'vitest';
import { joinUrl } from './joinUrl.js';

describe('joinUrl', () => {
  it('joins base url and path with a single slash', () => {
    expect(joinUrl('https://api.nuclino.com/v0', 'users/me')).toBe('https://api.nuclino.com/v0/users/me');
  });

  it('strips redundant slashes on both sides', () => {
    expect(joinUrl('https://api.nuclino.com/v0/', '/items/')).toBe('https://api.nuclino.com/v0/items');
    expect(joinUrl('https://example.test//', '//teams')).toBe('https://example.test/teams');
  });

  it('keeps inner slashes of the path', () => {
    expect(joinUrl('https://example.test', '/workspaces/ws-1')).toBe('https://example.test/workspaces/ws-1');
  });
});
