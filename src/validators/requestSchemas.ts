/**
 * requestSchemas.ts - zod schemas for request bodies and query strings.
 * Coordinates are range-checked here so the services can assume valid input.
 */

import { z } from 'zod';
import { ROLES } from '../types/domain';

const latitude = z.number().min(-90).max(90);
const longitude = z.number().min(-180).max(180);

// Query values arrive as strings; blank ones must not coerce to 0.
function numericParam(schema: z.ZodNumber) {
  return z.string().trim().min(1, 'Required').transform(Number).pipe(schema);
}

export const registerSchema = z.object({
  name: z.string().trim().min(1),
  email: z.string().trim().email(),
  password: z.string().min(4),
  role: z.enum(ROLES),
  phone: z.string().trim().min(1).optional(),
  lat: latitude.optional(),
  lng: longitude.optional(),
  preferredType: z.string().trim().min(1).optional(),
});

export const loginSchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(1),
});

export const createListingSchema = z.object({
  donorId: z.string().trim().min(1),
  title: z.string().trim().min(1),
  description: z.string().trim().optional(),
  type: z.string().trim().min(1),
  quantity: z.number().positive(),
  unit: z.string().trim().min(1).default('servings'),
  lat: latitude,
  lng: longitude,
  expiresInMinutes: z.number().int().positive().optional(),
});

export const nearbyQuerySchema = z.object({
  lat: numericParam(latitude),
  lng: numericParam(longitude),
  radius_km: numericParam(z.number().nonnegative()).optional(),
});

export const matchRequestSchema = z.object({
  listingId: z.string().trim().min(1),
});

export const matchesQuerySchema = z.object({
  user_id: z.string().trim().min(1).optional(),
});

export const sendMessageSchema = z.object({
  matchId: z.string().trim().min(1),
  senderId: z.string().trim().min(1),
  content: z.string().trim().min(1).max(1000),
});

export const messagesQuerySchema = z.object({
  match_id: z.string().trim().min(1),
});

export type RegisterBody = z.infer<typeof registerSchema>;
export type CreateListingBody = z.infer<typeof createListingSchema>;
