import { z } from 'zod';
import { SUPPORTED_LANGUAGES } from './schema';

const userIdParam = z.string().trim().min(1).max(64);

export const locationInputSchema = z.union([
  z.object({ latitude: z.number(), longitude: z.number() }).strict(),
  z.object({ postalCode: z.string().min(1).max(32) }).strict(),
  z.object({ skip: z.literal(true) }).strict(),
]);

export const api = {
  conversations: {
    photo: {
      method: 'POST' as const,
      path: '/api/conversations/:userId/photo',
      input: z.object({
        photoRef: z.string().min(1).max(255),
        imageBase64: z.string().min(1),
      }),
    },
    text: {
      method: 'POST' as const,
      path: '/api/conversations/:userId/text',
      input: z.object({ text: z.string().max(4096) }),
    },
    location: {
      method: 'POST' as const,
      path: '/api/conversations/:userId/location',
      input: locationInputSchema,
    },
    cancel: {
      method: 'POST' as const,
      path: '/api/conversations/:userId/cancel',
    },
    snapshot: {
      method: 'GET' as const,
      path: '/api/conversations/:userId',
    },
  },
  search: {
    text: {
      method: 'POST' as const,
      path: '/api/search',
      input: z.object({
        userId: userIdParam,
        query: z.string().min(1).max(500),
      }),
    },
  },
  users: {
    items: {
      method: 'GET' as const,
      path: '/api/users/:userId/items',
    },
    preferences: {
      method: 'PUT' as const,
      path: '/api/users/:userId/preferences',
      input: z.object({ language: z.enum(SUPPORTED_LANGUAGES) }),
    },
  },
  items: {
    list: {
      method: 'GET' as const,
      path: '/api/items',
    },
    get: {
      method: 'GET' as const,
      path: '/api/items/:id',
    },
    route: {
      method: 'GET' as const,
      path: '/api/items/:id/route',
    },
    delete: {
      method: 'DELETE' as const,
      path: '/api/items/:id',
      input: z.object({ userId: userIdParam }),
    },
  },
  health: {
    method: 'GET' as const,
    path: '/api/health',
  },
  params: {
    userId: userIdParam,
    itemId: z.coerce.number().int().positive(),
  },
};
