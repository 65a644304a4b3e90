import { z } from "zod";
import { SealedVaultWireSchema } from "../vault/codec.js";

const hex16Schema = z.string().regex(/^[0-9a-f]{32}$/, { error: "salt must be 16 bytes of lowercase hex" });

export const AuthSaltResponseSchema = z.object({ salt: hex16Schema });

export const TokenResponseSchema = z.object({ token: z.string().min(1) });

export const MfaStatusResponseSchema = z.object({ mfa_enabled: z.boolean() });

export const MfaSetupResponseSchema = z.object({
  secret: z.string().min(1),
  qr_code: z.string(),
  backup_codes: z.array(z.string()),
  provisioning_uri: z.string().min(1).optional(),
});

export const VaultResponseSchema = z.object({
  blob: SealedVaultWireSchema.nullable().optional(),
});

export const ErrorDetailSchema = z.object({ detail: z.string() });
