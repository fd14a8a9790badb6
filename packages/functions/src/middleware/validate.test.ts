import { describe, it, expect, vi } from 'vitest';
import express from 'express';
import request from 'supertest';
import { z, ZodError } from 'zod';
import { validate } from './validate.js';
import { errorHandler } from './error-handler.js';

describe('validate middleware', () => {
  it('should assign the parsed payload, defaults included, to req.body', async () => {
    const app = express();
    app.use(express.json());
    app.post(
      '/',
      validate(z.object({ amount: z.coerce.number().positive(), unit: z.string().default('g') })),
      (req, res) => {
        res.json(req.body);
      }
    );
    app.use(errorHandler);

    const response = await request(app).post('/').send({ amount: '250' });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ amount: 250, unit: 'g' });
  });

  it('should reject an invalid body as a validation error', async () => {
    const app = express();
    app.use(express.json());
    app.post(
      '/',
      validate(z.object({ amount: z.coerce.number().positive() })),
      (_req, res) => {
        res.status(201).json({});
      }
    );
    app.use(errorHandler);

    const response = await request(app).post('/').send({ amount: -1 });

    expect(response.status).toBe(400);
    expect(response.body.error.code).toBe('VALIDATION_ERROR');
    expect(response.body.error.message).toBe('Invalid request data');
  });

  it('should throw ZodError and skip next for an invalid payload', () => {
    const middleware = validate(z.object({ amount: z.number() }));
    const req = { body: { amount: 'lots' } };
    const next = vi.fn();

    expect(() => {
      middleware(req, {}, next);
    }).toThrow(ZodError);
    expect(next).not.toHaveBeenCalled();
  });

  it('should call next once the body is valid', () => {
    const middleware = validate(z.object({ name: z.string().trim() }));
    const req: { body?: unknown } = { body: { name: ' salt ' } };
    const next = vi.fn();

    middleware(req, {}, next);

    expect(req.body).toEqual({ name: 'salt' });
    expect(next).toHaveBeenCalledTimes(1);
  });
});
