import admin from "firebase-admin";
import fs from "fs";
import type { AppConfig } from "./config.js";

export function initFirebase(config: Pick<AppConfig, "GOOGLE_APPLICATION_CREDENTIALS" | "FIREBASE_STORAGE_BUCKET">) {
    if (!admin.apps.length) {
        const credPath = config.GOOGLE_APPLICATION_CREDENTIALS;
        const storageBucket = config.FIREBASE_STORAGE_BUCKET;
        if (credPath) {
            const json = JSON.parse(fs.readFileSync(credPath, "utf8"));
            admin.initializeApp({ credential: admin.credential.cert(json), storageBucket });
        } else {
            admin.initializeApp({ storageBucket });
        }
        // Optional fields such as description are left out rather than stored as undefined.
        admin.firestore().settings({ ignoreUndefinedProperties: true });
    }
    return admin;
}
