import type { SessionContext } from "./auth.js";

declare global {
  namespace Express {
    interface Request {
      sessionContext?: SessionContext;
    }
  }
}

export {};
