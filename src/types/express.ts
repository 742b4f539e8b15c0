import type { TokenClaims } from '../utils/token';
import type { Principal } from '../services/access.service';

declare global {
  namespace Express {
    interface Request {
      user?: TokenClaims;
      principal?: Principal;
    }
  }
}

export {};
