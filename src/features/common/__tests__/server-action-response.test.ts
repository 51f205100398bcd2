import { z } from 'zod';
import {
  serverActionError,
  validateRequest,
  zodErrorsToServerActionErrors,
} from '../server-action-response';

describe('zodErrorsToServerActionErrors', () => {
  it('joins the issue path into a field name', () => {
    const schema = z.object({
      items: z.array(z.object({ role: z.string() })),
    });
    const result = schema.safeParse({ items: [{ role: 1 }] });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(zodErrorsToServerActionErrors(result.error.errors)).toEqual([
        { message: 'Expected string, received number', field: 'items.0.role' },
      ]);
    }
  });

  it('leaves out the field for root issues', () => {
    const result = z.string().safeParse(42);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(zodErrorsToServerActionErrors(result.error.errors)).toEqual([
        { message: 'Expected string, received number' },
      ]);
    }
  });
});

describe('serverActionError', () => {
  it('builds a single error response', () => {
    expect(serverActionError('BAD_REQUEST', 'File must be an image')).toEqual({
      status: 'BAD_REQUEST',
      errors: [{ message: 'File must be an image' }],
    });
    expect(serverActionError('INVALID_REQUEST', 'Image file is required', 'image')).toEqual({
      status: 'INVALID_REQUEST',
      errors: [{ message: 'Image file is required', field: 'image' }],
    });
  });
});

describe('validateRequest', () => {
  const schema = z.object({ message: z.string({ required_error: 'Message is required' }) });

  it('returns the parsed data', () => {
    expect(validateRequest(schema, { message: 'hi', extra: true })).toEqual({
      status: 'OK',
      response: { message: 'hi' },
    });
  });

  it('returns INVALID_REQUEST with every issue', () => {
    expect(validateRequest(schema, {})).toEqual({
      status: 'INVALID_REQUEST',
      errors: [{ message: 'Message is required', field: 'message' }],
    });
  });
});
