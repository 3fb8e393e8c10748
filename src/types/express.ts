import { Principal } from "./PrincipalInterface";

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      /** Set by the auth middleware from a verified bearer token. */
      principal?: Principal;
    }
  }
}

export {};
