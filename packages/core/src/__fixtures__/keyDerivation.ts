import { createKeyDerivation } from "../crypto/keyDerivation.js";

// Cheap Argon2id profile so suites stay fast; keeps the production lane count.
export const TEST_KDF_COST = { t: 1, m: 64, p: 4 };

export const createTestKeyDerivation = () => createKeyDerivation({ cost: TEST_KDF_COST });
