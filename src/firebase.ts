import admin from "firebase-admin";
import fs from "node:fs";
import { z } from "zod";
import { AppConfig } from "./config.js";

const serviceAccountSchema = z
  .object({
    project_id: z.string(),
    client_email: z.string(),
    private_key: z.string(),
  })
  .transform((sa) => ({
    projectId: sa.project_id,
    clientEmail: sa.client_email,
    privateKey: sa.private_key,
  }));

/** Inline service-account JSON wins over a key file path. */
function resolveCredential(config: AppConfig): admin.credential.Credential | null {
  if (config.FIREBASE_SERVICE_ACCOUNT_JSON) {
    const json: unknown = JSON.parse(config.FIREBASE_SERVICE_ACCOUNT_JSON);
    return admin.credential.cert(serviceAccountSchema.parse(json));
  }
  const keyFile = config.GOOGLE_APPLICATION_CREDENTIALS;
  if (!keyFile) return null;
  if (!fs.existsSync(keyFile)) {
    throw new Error(`GOOGLE_APPLICATION_CREDENTIALS not found at: ${keyFile}`);
  }
  return admin.credential.cert(keyFile);
}

/** Null when no Firebase credentials are configured. */
export function initializeFirestore(config: AppConfig): admin.firestore.Firestore | null {
  const credential = resolveCredential(config);
  if (!credential) return null;
  const app = admin.apps.length ? admin.app() : admin.initializeApp({ credential });
  return admin.firestore(app);
}
