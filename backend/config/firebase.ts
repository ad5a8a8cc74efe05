/**
 * Centralized Firebase Admin Configuration
 * Initializes Firebase Admin on first use and exports the shared Firestore instance
 */

import admin from 'firebase-admin';
import { existsSync } from 'fs';
import { join } from 'path';

let firebaseAdmin: admin.app.App | null = null;
let firestoreDb: admin.firestore.Firestore | null = null;
let isInitialized = false;

/**
 * Candidate service-account locations, FIREBASE_SERVICE_ACCOUNT_PATH first
 */
export const getServiceAccountPaths = (env: NodeJS.ProcessEnv = process.env): string[] => {
  const paths: string[] = [];
  const configured = env['FIREBASE_SERVICE_ACCOUNT_PATH']?.trim();
  if (configured) {
    paths.push(configured);
  }
  paths.push(
    join(process.cwd(), 'backend', 'firebase-service-account.json'),
    join(process.cwd(), 'firebase-service-account.json')
  );
  return paths;
};

/**
 * Initialize Firebase Admin SDK
 */
const initializeFirebase = (): boolean => {
  if (isInitialized && firebaseAdmin) {
    return true;
  }

  try {
    let app = admin.apps.length > 0 ? admin.apps[0] : null;
    if (!app) {
      const possiblePaths = getServiceAccountPaths();
      const serviceAccountPath = possiblePaths.find(path => existsSync(path));

      if (!serviceAccountPath) {
        console.warn('⚠️ Firebase service account file not found in any of these locations:');
        possiblePaths.forEach(path => console.warn(`   ${path}`));
        return false;
      }

      app = admin.initializeApp({
        credential: admin.credential.cert(serviceAccountPath),
        projectId: process.env['FIREBASE_PROJECT_ID'] || undefined
      });
    }

    firebaseAdmin = app;
    firestoreDb = admin.firestore(app);
    // Configure Firestore to ignore undefined properties
    firestoreDb.settings({
      ignoreUndefinedProperties: true
    });
    isInitialized = true;
    return true;
  } catch (error) {
    console.error('❌ Firebase Admin initialization failed:', error instanceof Error ? error.message : error);
    firebaseAdmin = null;
    firestoreDb = null;
    isInitialized = false;
    return false;
  }
};

/**
 * Get Firestore database instance, or null when Firebase is not configured
 */
export const getFirestore = (): admin.firestore.Firestore | null => {
  if (!firestoreDb && !isInitialized) {
    initializeFirebase();
  }
  return firestoreDb;
};
