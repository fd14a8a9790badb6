import { getApps, initializeApp } from 'firebase-admin/app';
import { getFirestore, type Firestore } from 'firebase-admin/firestore';
import { getConfig } from './config.js';

let db: Firestore | null = null;

export function initializeFirebase(): void {
  if (getApps().length === 0) {
    initializeApp();
  }
}

export function getFirestoreDb(): Firestore {
  if (db === null) {
    initializeFirebase();
    db = getFirestore();
  }
  return db;
}

export function getCollectionName(name: string): string {
  return `${getConfig().collectionPrefix}${name}`;
}
