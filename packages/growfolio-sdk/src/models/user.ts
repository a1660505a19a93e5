import { z } from 'zod';
import { timestampSchema } from './common.js';

export const userSchema = z.object({
  id: z.string(),
  email: z.string(),
  displayName: z.string().nullish(),
  profilePictureUrl: z.string().nullish(),
  preferredCurrency: z.string().default('USD'),
  subscriptionTier: z.string().default('free'),
  createdAt: timestampSchema,
  updatedAt: timestampSchema.optional(),
});

export type User = z.infer<typeof userSchema>;

export const userPreferencesSchema = z.object({
  preferredCurrency: z.string().default('USD'),
  notificationsEnabled: z.boolean().default(true),
  dcaReminders: z.boolean().default(true),
  goalProgressAlerts: z.boolean().default(true),
  marketAlerts: z.boolean().default(false),
  weeklyDigest: z.boolean().default(true),
});

export type UserPreferences = z.infer<typeof userPreferencesSchema>;

export type UserPreferencesUpdate = Partial<UserPreferences>;
