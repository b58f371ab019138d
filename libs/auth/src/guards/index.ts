export {
  AccessGuard,
  AdminGate,
  createAccessGuard,
  extractBearerToken,
} from './access.guard';
export type { AccessGuardInstance, AccessPolicy } from './access.guard';
