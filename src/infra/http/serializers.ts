import type { Account } from '../../domain/auth/account.js';
import type { AccountPage } from '../../application/accounts/accountService.js';
import type { LoginResult } from '../../application/auth/login.js';

export interface UserProfile {
  id: string;
  email: string;
  full_name: string | null;
  is_active: boolean;
  is_admin: boolean;
  last_login: string | null;
  created_at: string;
}

export function toUserProfile(account: Account): UserProfile {
  return {
    id: account.id,
    email: account.email,
    full_name: account.fullName,
    is_active: account.isActive,
    is_admin: account.isAdmin,
    last_login: account.lastLogin ? account.lastLogin.toISOString() : null,
    created_at: account.createdAt.toISOString(),
  };
}

export function toTokenResponse(result: LoginResult) {
  return {
    access_token: result.accessToken,
    token_type: result.tokenType,
    expires_in: result.expiresIn,
  };
}

export function toUserPage(page: AccountPage) {
  return {
    items: page.items.map(toUserProfile),
    pagination: {
      total_items: page.pagination.totalItems,
      total_pages: page.pagination.totalPages,
      current_page: page.pagination.currentPage,
      limit: page.pagination.limit,
    },
  };
}
