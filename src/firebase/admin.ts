import * as admin from 'firebase-admin';

function ensureApp(): void {
  if (admin.apps.length === 0) {
    admin.initializeApp();
  }
}

export function getDatabase(): admin.database.Database {
  ensureApp();
  return admin.database();
}

export function getFirestore(): admin.firestore.Firestore {
  ensureApp();
  return admin.firestore();
}
