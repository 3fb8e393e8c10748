export { createAuth, principalOf } from "./auth";
export { errorMiddleware, notFound, sendError } from "./errorHandler";
