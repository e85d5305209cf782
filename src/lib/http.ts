import { NextResponse } from 'next/server';
import { ZodError } from 'zod';
import { ModelConfigError } from '../gateway/errors';
import { SourceNotFoundError } from '../ingestion/feedIngestor';
import { DuplicateSourceError } from '../store/types';
import { errorMessage, logger } from '../utils/logger';

export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

export function parseId(raw: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) {
    throw new BadRequestError(`Invalid id: ${raw}`);
  }
  return id;
}

export async function readJson(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch (error) {
    throw new BadRequestError(`Invalid JSON body: ${errorMessage(error)}`);
  }
}

function statusFor(error: unknown): number {
  if (error instanceof BadRequestError || error instanceof ZodError || error instanceof ModelConfigError) {
    return 400;
  }
  if (error instanceof SourceNotFoundError) {
    return 404;
  }
  if (error instanceof DuplicateSourceError) {
    return 409;
  }
  return 500;
}

/**
 * Map a thrown error to a JSON error response
 */
export function errorResponse(error: unknown): NextResponse {
  const status = statusFor(error);
  if (status === 500) {
    logger.error('API request failed:', error);
  }
  const message = error instanceof ZodError
    ? error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ')
    : errorMessage(error);
  return NextResponse.json({ error: message }, { status });
}
