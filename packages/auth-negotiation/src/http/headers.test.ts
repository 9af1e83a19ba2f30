import { describe, it, expect } from 'vitest';
import { mergeHeaders, setHeader } from './headers.js';

describe('setHeader', () => {
  it('setHeader_DifferentCase_ReplacesExisting', () => {
    const headers = setHeader({ authorization: 'Basic old', Accept: '*/*' }, 'Authorization', 'Bearer new');

    expect(headers).toEqual({ Accept: '*/*', Authorization: 'Bearer new' });
  });

  it('setHeader_UndefinedHeaders_CreatesRecord', () => {
    expect(setHeader(undefined, 'Accept', 'application/json')).toEqual({ Accept: 'application/json' });
  });
});

describe('mergeHeaders', () => {
  it('mergeHeaders_LaterSetWins', () => {
    const headers = mergeHeaders({ 'User-Agent': 'a', 'X-Trace': '1' }, undefined, { 'user-agent': 'b' });

    expect(headers).toEqual({ 'X-Trace': '1', 'user-agent': 'b' });
  });
});
