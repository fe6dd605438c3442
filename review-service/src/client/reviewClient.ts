import got from 'got';
import { z } from 'zod';
import {
  ReviewResponseSchema,
  ValidationErrorResponseSchema,
} from '../types/types';
import type {
  HealthResponse,
  ReviewRequestInput,
  ReviewResponse,
  RootResponse,
  ValidationErrorDetail,
} from '../types/types';

type FactoryInput = { baseUrl: string; timeoutMs?: number };

export class ReviewServiceError extends Error {
  constructor(readonly statusCode: number, message: string) {
    super(message);
    this.name = 'ReviewServiceError';
  }
}

export class ReviewRejectedError extends ReviewServiceError {
  constructor(readonly detail: ValidationErrorDetail[]) {
    super(422, `Review request rejected: ${detail.map(d => `${d.loc.join('.')} (${d.type})`).join(', ')}`);
    this.name = 'ReviewRejectedError';
  }
}

const HealthResponseSchema = z.object({ status: z.literal('healthy') });
const RootResponseSchema = z.object({ message: z.string() });

export function reviewClientFactory({ baseUrl, timeoutMs = 10000 }: FactoryInput) {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  const endpoint = (path: string) => new URL(path, base);
  const client = got.extend({
    timeout: { request: timeoutMs },
    retry: 0,
    throwHttpErrors: false,
  });

  async function review(request: ReviewRequestInput): Promise<ReviewResponse> {
    const resp = await client.post<unknown>(endpoint('api/review'), { json: request, responseType: 'json' });
    if (resp.statusCode === 422) {
      const rejection = ValidationErrorResponseSchema.parse(resp.body);
      throw new ReviewRejectedError(rejection.detail);
    }
    if (resp.statusCode !== 200) {
      throw new ReviewServiceError(resp.statusCode, `Review request failed with status ${resp.statusCode}`);
    }
    return ReviewResponseSchema.parse(resp.body);
  }

  async function getJson(path: string): Promise<unknown> {
    const resp = await client.get<unknown>(endpoint(path), { responseType: 'json' });
    if (resp.statusCode !== 200) {
      throw new ReviewServiceError(resp.statusCode, `GET /${path} failed with status ${resp.statusCode}`);
    }
    return resp.body;
  }

  async function health(): Promise<HealthResponse> {
    return HealthResponseSchema.parse(await getJson('health'));
  }

  async function info(): Promise<RootResponse> {
    return RootResponseSchema.parse(await getJson(''));
  }

  return { review, health, info };
}

export type ReviewClient = ReturnType<typeof reviewClientFactory>;
