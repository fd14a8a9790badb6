export {
  type MockDocumentSnapshot,
  type MockQueryDocumentSnapshot,
  type MockQuerySnapshot,
  type MockFirestoreQuery,
  type FirestoreMocks,
  createMockDoc,
  createMockQuerySnapshot,
  createFirestoreMocks,
  setupFirebaseMock,
} from './firestore-mock.js';
