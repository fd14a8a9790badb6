import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { stripPathPrefix } from './strip-path-prefix.js';

async function rewrite(resource: string, url: string): Promise<string> {
  const app = express();
  app.use(stripPathPrefix(resource));
  app.use((req, res) => {
    res.json({ url: req.url });
  });

  const response = await request(app).get(url);
  return response.body.url;
}

describe('stripPathPrefix', () => {
  it('should strip the /api/<resource> prefix', async () => {
    expect(await rewrite('recipes', '/api/recipes/abc')).toBe('/abc');
  });

  it('should strip a bare /<resource> prefix', async () => {
    expect(await rewrite('recipes', '/recipes/by-name/pancakes')).toBe('/by-name/pancakes');
  });

  it('should map the resource root to /', async () => {
    expect(await rewrite('recipes', '/api/recipes')).toBe('/');
    expect(await rewrite('recipes', '/recipes?min_score=0.5')).toBe('/?min_score=0.5');
  });

  it('should leave paths that only share a prefix untouched', async () => {
    expect(await rewrite('recipes', '/recipes-archive/1')).toBe('/recipes-archive/1');
  });

  it('should treat dots in resource names literally', async () => {
    expect(await rewrite('a.b', '/axb/1')).toBe('/axb/1');
  });

  it('should leave already-relative paths alone', async () => {
    expect(await rewrite('ingredients', '/expiring?days=3')).toBe('/expiring?days=3');
  });
});
