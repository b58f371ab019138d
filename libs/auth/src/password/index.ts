export { PasswordHasher } from './password-hasher.service';
