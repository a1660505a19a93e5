import type { Result } from 'neverthrow';
import type { RepositoryError } from '../errors/types.js';
import type { LoadOptions } from '../repositories/resource-cache.js';
import type {
  Family,
  FamilyAccount,
  FamilyAccountInput,
  FamilyGoal,
  FamilyInput,
  FamilyInvite,
  FamilyInviteInput,
  FamilyMember,
  FamilyMemberPrivacy,
  FamilyRole,
  FamilyUpdate,
} from '../models/index.js';

export interface FamilyRemote {
  readonly getFamily: () => Promise<Result<Family, RepositoryError>>;
  readonly createFamily: (input: FamilyInput) => Promise<Result<Family, RepositoryError>>;
  readonly updateFamily: (id: string, update: FamilyUpdate) => Promise<Result<Family, RepositoryError>>;
  readonly deleteFamily: (id: string) => Promise<Result<void, RepositoryError>>;
  readonly inviteMember: (input: FamilyInviteInput) => Promise<Result<FamilyInvite, RepositoryError>>;
  readonly resendInvite: (inviteId: string) => Promise<Result<FamilyInvite, RepositoryError>>;
  readonly cancelInvite: (inviteId: string) => Promise<Result<void, RepositoryError>>;
  readonly listPendingInvites: () => Promise<Result<FamilyInvite[], RepositoryError>>;
  readonly listReceivedInvites: () => Promise<Result<FamilyInvite[], RepositoryError>>;
  readonly acceptInvite: (inviteId: string) => Promise<Result<Family, RepositoryError>>;
  readonly declineInvite: (inviteId: string) => Promise<Result<void, RepositoryError>>;
  readonly updateMember: (
    memberId: string,
    update: { readonly role: FamilyRole } | FamilyMemberPrivacy
  ) => Promise<Result<FamilyMember, RepositoryError>>;
  readonly removeMember: (memberId: string) => Promise<Result<void, RepositoryError>>;
  readonly leaveFamily: () => Promise<Result<void, RepositoryError>>;
  readonly listFamilyGoals: () => Promise<Result<FamilyGoal[], RepositoryError>>;
  readonly listFamilyAccounts: () => Promise<Result<FamilyAccount[], RepositoryError>>;
  readonly createFamilyAccount: (input: FamilyAccountInput) => Promise<Result<FamilyAccount, RepositoryError>>;
}

/**
 * The user's family group, its invites, shared goals and managed accounts.
 *
 * Invite lists are cached apart from the family and are only dropped by
 * invite mutations.
 */
export interface FamilyRepository {
  /** `null` when the user belongs to no family; that answer is cached too. */
  readonly fetchFamily: (options?: LoadOptions) => Promise<Result<Family | null, RepositoryError>>;
  readonly createFamily: (input: FamilyInput) => Promise<Result<Family, RepositoryError>>;
  readonly updateFamily: (id: string, update: FamilyUpdate) => Promise<Result<Family, RepositoryError>>;
  readonly deleteFamily: (id: string) => Promise<Result<void, RepositoryError>>;

  readonly inviteMember: (input: FamilyInviteInput) => Promise<Result<FamilyInvite, RepositoryError>>;
  readonly resendInvite: (inviteId: string) => Promise<Result<FamilyInvite, RepositoryError>>;
  readonly cancelInvite: (inviteId: string) => Promise<Result<void, RepositoryError>>;
  readonly fetchPendingInvites: (options?: LoadOptions) => Promise<Result<FamilyInvite[], RepositoryError>>;
  readonly fetchReceivedInvites: (options?: LoadOptions) => Promise<Result<FamilyInvite[], RepositoryError>>;
  readonly acceptInvite: (inviteId: string) => Promise<Result<Family, RepositoryError>>;
  readonly declineInvite: (inviteId: string) => Promise<Result<void, RepositoryError>>;

  readonly updateMemberRole: (memberId: string, role: FamilyRole) => Promise<Result<FamilyMember, RepositoryError>>;
  readonly updateMemberPrivacy: (
    memberId: string,
    privacy: FamilyMemberPrivacy
  ) => Promise<Result<FamilyMember, RepositoryError>>;
  readonly removeMember: (memberId: string) => Promise<Result<void, RepositoryError>>;
  readonly leaveFamily: () => Promise<Result<void, RepositoryError>>;

  readonly fetchFamilyGoals: (options?: LoadOptions) => Promise<Result<FamilyGoal[], RepositoryError>>;
  readonly fetchFamilyAccounts: (options?: LoadOptions) => Promise<Result<FamilyAccount[], RepositoryError>>;
  readonly createFamilyAccount: (input: FamilyAccountInput) => Promise<Result<FamilyAccount, RepositoryError>>;

  readonly invalidateCache: () => void;
}
