import { z } from 'zod';
import { timestampSchema } from './common.js';

export const familyRoleSchema = z.enum(['admin', 'member', 'viewer']);

export type FamilyRole = z.infer<typeof familyRoleSchema>;

export const familyMemberSchema = z.object({
  id: z.string(),
  userId: z.string(),
  name: z.string(),
  email: z.string(),
  role: familyRoleSchema,
  status: z.string().default('active'),
  shareGoals: z.boolean().default(true),
  sharePortfolioValue: z.boolean().default(false),
  joinedAt: timestampSchema.nullish(),
});

export type FamilyMember = z.infer<typeof familyMemberSchema>;

export const familySchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullish(),
  ownerId: z.string(),
  adminIds: z.array(z.string()).default([]),
  members: z.array(familyMemberSchema).default([]),
  maxMembers: z.number().int().default(10),
  allowSharedGoals: z.boolean().default(true),
  createdAt: timestampSchema.optional(),
  updatedAt: timestampSchema.optional(),
});

export type Family = z.infer<typeof familySchema>;

export const familyInviteStatusSchema = z.enum(['pending', 'accepted', 'declined', 'expired', 'cancelled']);

export const familyInviteSchema = z.object({
  id: z.string(),
  familyId: z.string(),
  familyName: z.string().nullish(),
  inviteeEmail: z.string(),
  role: familyRoleSchema,
  status: familyInviteStatusSchema,
  inviteCode: z.string().nullish(),
  expiresAt: timestampSchema,
});

export type FamilyInvite = z.infer<typeof familyInviteSchema>;

export const familyAccountSchema = z.object({
  id: z.string(),
  name: z.string(),
  relationship: z.string(),
  dateOfBirth: timestampSchema.nullish(),
  portfolioId: z.string().nullish(),
  createdAt: timestampSchema.optional(),
});

export type FamilyAccount = z.infer<typeof familyAccountSchema>;

export const familyGoalSchema = z.object({
  id: z.string(),
  name: z.string(),
  ownerName: z.string(),
  targetAmount: z.number(),
  currentAmount: z.number(),
  targetDate: timestampSchema.nullish(),
});

export type FamilyGoal = z.infer<typeof familyGoalSchema>;

export interface FamilyInput {
  readonly name: string;
  readonly description?: string | undefined;
}

export interface FamilyUpdate {
  readonly name?: string | undefined;
  readonly description?: string | undefined;
  readonly allowSharedGoals?: boolean | undefined;
}

export interface FamilyMemberPrivacy {
  readonly shareGoals?: boolean | undefined;
  readonly sharePortfolioValue?: boolean | undefined;
}

export interface FamilyAccountInput {
  readonly name: string;
  readonly relationship: string;
  readonly dateOfBirth?: string | undefined;
}

export interface FamilyInviteInput {
  readonly email: string;
  readonly role: FamilyRole;
  readonly message?: string | undefined;
}
