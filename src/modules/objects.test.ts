import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { ZodError } from 'zod';
import { HttpClient } from '../lib/http-client';
import { action, filter, sorter } from '../lib/query-encoder';
import { TokenManager } from '../lib/token-manager';
import { MemoryTokenStorage } from '../lib/token-storage';
import type { FetchLike } from '../types';
import { Objects } from './objects';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const headers = { AnonymousToken: 'test-anonymous-token', AppName: 'test-app' };
const jsonHeaders = { ...headers, 'Content-Type': 'application/json' };

describe('Objects', () => {
  let fetchMock: Mock<FetchLike>;
  let objects: Objects;

  beforeEach(() => {
    fetchMock = vi.fn<FetchLike>();
    fetchMock.mockImplementation(async () => jsonResponse({ ok: true }));
    const tokenManager = new TokenManager({
      storage: new MemoryTokenStorage(),
      anonymousToken: 'test-anonymous-token',
    });
    objects = new Objects(new HttpClient({ appName: 'test-app', fetch: fetchMock }, tokenManager));
  });

  it('gets a single item', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ id: 7, name: 'Tom' }));

    const { data, error } = await objects.getItem<{ id: number; name: string }>('cats', '7');

    expect(error).toBeNull();
    expect(data).toEqual({ id: 7, name: 'Tom' });
    expect(fetchMock).toHaveBeenCalledWith('https://api.backand.com/1/objects/cats/7', {
      method: 'GET',
      headers,
      body: undefined,
    });
  });

  it('gets a single item with options', async () => {
    await objects.getItem('cats', '7', [{ type: 'deep', value: true }]);

    expect(fetchMock.mock.calls[0][0]).toBe('https://api.backand.com/1/objects/cats/7?deep=true');
  });

  it('gets items with paging, filters and sorting', async () => {
    await objects.getItems('cats', [
      { type: 'pageSize', value: 20 },
      { type: 'pageNumber', value: 1 },
      { type: 'filter', value: [filter('age', 'greaterThan', 2)] },
      { type: 'sort', value: [sorter('name', 'asc')] },
      { type: 'exclude', value: ['__metadata'] },
    ]);

    expect(fetchMock.mock.calls[0][0]).toBe(
      'https://api.backand.com/1/objects/cats' +
        '?pageSize=20' +
        '&pageNumber=1' +
        '&filter=%5B%7B%22fieldName%22%3A%22age%22%2C%22operator%22%3A%22greaterThan%22%2C%22value%22%3A2%7D%5D' +
        '&sorter=%5B%7B%22fieldName%22%3A%22name%22%2C%22order%22%3A%22asc%22%7D%5D' +
        '&exclude=__metadata'
    );
  });

  it('appends a bare question mark for an empty option list', async () => {
    await objects.getItems('cats', []);
    expect(fetchMock.mock.calls[0][0]).toBe('https://api.backand.com/1/objects/cats?');
  });

  it('leaves the query off when no options are given', async () => {
    await objects.getItems('cats');
    expect(fetchMock.mock.calls[0][0]).toBe('https://api.backand.com/1/objects/cats');
  });

  it('creates an item', async () => {
    await objects.createItem('cats', { name: 'Tom' }, [{ type: 'returnObject', value: true }]);

    expect(fetchMock).toHaveBeenCalledWith('https://api.backand.com/1/objects/cats?returnObject=true', {
      method: 'POST',
      headers: jsonHeaders,
      body: '{"name":"Tom"}',
    });
  });

  it('updates an item', async () => {
    await objects.updateItem('cats', '7', { name: 'Tom' });

    expect(fetchMock).toHaveBeenCalledWith('https://api.backand.com/1/objects/cats/7', {
      method: 'PUT',
      headers: jsonHeaders,
      body: '{"name":"Tom"}',
    });
  });

  it('deletes an item', async () => {
    await objects.deleteItem('cats', '7');

    expect(fetchMock).toHaveBeenCalledWith('https://api.backand.com/1/objects/cats/7', {
      method: 'DELETE',
      headers,
      body: undefined,
    });
  });

  it('performs bulk actions', async () => {
    await objects.performActions([
      action('POST', '/1/objects/cats', { name: 'Tom' }),
      action('PUT', '/1/objects/cats/8', { name: 'Felix' }),
      action('DELETE', '/1/objects/cats/7'),
    ]);

    expect(fetchMock).toHaveBeenCalledWith('https://api.backand.com/1/bulk', {
      method: 'POST',
      headers: jsonHeaders,
      body:
        '[{"method":"POST","url":"/1/objects/cats","data":{"name":"Tom"}},' +
        '{"method":"PUT","url":"/1/objects/cats/8","data":{"name":"Felix"}},' +
        '{"method":"DELETE","url":"/1/objects/cats/7"}]',
    });
  });

  it('returns failures as values', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ Message: 'Forbidden' }, 403));

    const result = await objects.deleteItem('cats', '7');

    expect(result.data).toBeNull();
    expect(result.error?.error).toBe('HTTP_ERROR');
    expect(result.error?.statusCode).toBe(403);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('rejects invalid options before sending anything', async () => {
    await expect(
      objects.getItems('cats', [{ type: 'sort', value: [{ fieldName: '', order: 'asc' }] }])
    ).rejects.toThrow(ZodError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
