export { ConflictError } from "./conflict-error.js";
export { InternalError } from "./internal-error.js";
export { NotFoundError } from "./not-found-error.js";
export { RateLimitError } from "./rate-limit-error.js";
export { ValidationError } from "./validation-error.js";
