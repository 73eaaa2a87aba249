export type { User, UserRole, PublicUser, UserSnapshot, AvatarUpload } from './user';
export { USER_ROLES } from './user';
export type { Contact, ContactInput } from './contact';
export { type Result, type Ok, type Err, ok, err } from './result';
export {
  AVATAR_CONTENT_TYPES,
  PASSWORD_RESET_MESSAGE,
  toPublicUser,
  toSnapshot,
  fromSnapshot,
  avatarObjectKey,
} from './auth';
export type {
  WithTransaction,
  UserRepository,
  ContactRepository,
  CredentialHasher,
  TokenPurpose,
  TokenFailure,
  TokenService,
  UserCache,
  MailTemplate,
  MailMessage,
  Mailer,
  AvatarStorage,
} from './ports';
export { AccessPolicy, ANY_ROLE, ADMIN_ONLY, canChangeAvatar } from './access-policy';
export { SessionResolver, type SessionResolverDeps } from './session-resolver';
export {
  AuthService,
  AuthError,
  type AuthErrorKind,
  type AuthServiceDeps,
  type LoginResult,
} from './auth-service';
export { daysUntilBirthday, isBirthdayWithin } from './birthdays';
export {
  ContactService,
  ContactError,
  UPCOMING_BIRTHDAY_DAYS,
  type ContactServiceDeps,
} from './contact-service';
