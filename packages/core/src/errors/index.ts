export { cryptoErrors } from "./crypto.js";
export { sessionErrors } from "./session.js";
export { vaultErrors } from "./vault.js";
