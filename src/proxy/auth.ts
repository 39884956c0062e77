import { createClient } from "@supabase/supabase-js";

export type AuthenticatedUser = {
  id: string;
};

export interface AuthVerifier {
  verify(authorizationHeader: string | null): Promise<AuthenticatedUser | null>;
}

export function readBearerToken(authorizationHeader: string | null): string | null {
  const match = /^Bearer\s+(.+)$/i.exec((authorizationHeader ?? "").trim());
  const token = match?.[1]?.trim();
  return token ? token : null;
}

/** Resolves the caller's access token against Supabase Auth with the anon key. */
export class SupabaseAuthVerifier implements AuthVerifier {
  constructor(
    private readonly supabaseUrl: string,
    private readonly anonKey: string,
  ) {}

  async verify(authorizationHeader: string | null): Promise<AuthenticatedUser | null> {
    const token = readBearerToken(authorizationHeader);
    if (!token) {
      return null;
    }
    const client = createClient(this.supabaseUrl, this.anonKey, {
      global: { headers: { Authorization: `Bearer ${token}` } },
      auth: { persistSession: false, autoRefreshToken: false },
    });
    const { data, error } = await client.auth.getUser(token);
    if (error || !data.user) {
      return null;
    }
    return { id: data.user.id };
  }
}
