import admin from "firebase-admin";
import type { ServiceAccount } from "firebase-admin/app";
import type { Messaging } from "firebase-admin/messaging";
import { z } from "zod";

const ServiceAccountSchema = z.object({
  project_id: z.string().min(1),
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

export function parseServiceAccount(json: string): ServiceAccount {
  const parsed = ServiceAccountSchema.parse(JSON.parse(json));
  return {
    projectId: parsed.project_id,
    clientEmail: parsed.client_email,
    // Keys pasted into env files usually carry escaped newlines.
    privateKey: parsed.private_key.replace(/\\n/g, "\n"),
  };
}

/** Initialises the default app once and returns its messaging client. */
export function firebaseMessaging(serviceAccountJson: string): Messaging {
  if (!admin.apps.length) {
    admin.initializeApp({ credential: admin.credential.cert(parseServiceAccount(serviceAccountJson)) });
  }
  return admin.messaging();
}
