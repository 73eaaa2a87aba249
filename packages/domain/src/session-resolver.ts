import { type PublicUser } from './user';
import { type TokenService, type UserCache, type UserRepository, type WithTransaction } from './ports';
import { fromSnapshot, toPublicUser, toSnapshot } from './auth';
import { type Result, ok, err } from './result';

export interface SessionResolverDeps {
  tokenService: TokenService;
  userCache: UserCache;
  userRepo: UserRepository;
  withTransaction: WithTransaction;
  cacheTtlSeconds?: number;
}

/**
 * Turns a bearer token into the authenticated user. The cache is consulted
 * first; a hit returns the snapshot without touching the directory.
 */
export class SessionResolver {
  constructor(private readonly deps: SessionResolverDeps) {}

  async resolve(token: string): Promise<Result<PublicUser, 'UNAUTHORIZED'>> {
    const { tokenService, userCache, userRepo } = this.deps;

    const validated = await tokenService.validate(token, 'access');
    if (!validated.ok) return err('UNAUTHORIZED');
    const email = validated.value;

    const cached = await userCache.get(email);
    if (cached) return ok(fromSnapshot(cached));

    const user = await this.deps.withTransaction((tx) => userRepo.findByEmail(tx, email));
    if (!user) return err('UNAUTHORIZED');

    const publicUser = toPublicUser(user);
    await userCache.put(email, toSnapshot(publicUser), this.deps.cacheTtlSeconds);
    return ok(publicUser);
  }
}
