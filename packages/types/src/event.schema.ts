import { z } from 'zod';

// Audit event names; the events table caps them at 10 octets
export const EventNameSchema = z.enum([
  'login',
  'logout',
  'register',
  'save_token',
  'reset_pass',
  'confirmed',
]);

export type EventName = z.infer<typeof EventNameSchema>;

export const EVENT_NAMES = EventNameSchema.options;
