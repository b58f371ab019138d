export { AccountsService } from './accounts.service';
export type { RegisterOptions } from './accounts.service';
export {
  AccountNotFoundException,
  UsernameTakenException,
} from './accounts.exceptions';
