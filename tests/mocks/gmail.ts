/**
 * Mock for googleapis module (Gmail).
 *
 * Provides configurable mock responses for testing the Gmail adapter
 * without making real API calls.
 */

import { vi } from 'vitest';

/**
 * Mock Gmail message structure.
 */
export interface MockMessage {
  id: string;
  threadId?: string;
  historyId?: string;
  internalDate?: string;
  labelIds?: string[];
  snippet?: string;
  payload?: {
    headers?: Array<{ name: string; value: string }>;
    mimeType?: string;
    body?: { data?: string };
    parts?: Array<{
      mimeType?: string;
      filename?: string;
      body?: { data?: string };
      parts?: Array<{ mimeType?: string; body?: { data?: string } }>;
    }>;
  };
}

/**
 * Mock history.list response body.
 */
export interface MockHistory {
  historyId?: string;
  nextPageToken?: string;
  history?: Array<{
    messagesAdded?: Array<{ message: { id: string } }>;
    labelsAdded?: Array<{ message: { id: string } }>;
    labelsRemoved?: Array<{ message: { id: string } }>;
  }>;
}

type MockOperation = 'list' | 'history' | 'modify' | 'trash' | 'untrash' | 'send';

// Gmail mock state
let mockMessages: MockMessage[] = [];
let mockProfileHistoryId = '1000';
let mockNextPageToken: string | undefined;
let mockHistory: MockHistory = {};
let mockSentId = 'sent-msg-1';
const failures = new Map<MockOperation, unknown>();

/**
 * Set the messages returned by messages.list() and messages.get().
 */
export function setMockMessages(messages: MockMessage[], nextPageToken?: string): void {
  mockMessages = [...messages];
  mockNextPageToken = nextPageToken;
}

export function setMockProfileHistoryId(historyId: string): void {
  mockProfileHistoryId = historyId;
}

export function setMockHistory(history: MockHistory): void {
  mockHistory = history;
}

export function setMockSentId(id: string): void {
  mockSentId = id;
}

/**
 * Make the next calls to an operation reject with the given error.
 */
export function setMockFailure(operation: MockOperation, error: unknown): void {
  failures.set(operation, error);
}

/**
 * An error shaped like the ones gaxios raises for HTTP failures.
 */
export function httpError(status: number, message = `Request failed with status ${status}`): Error {
  return Object.assign(new Error(message), { code: status, response: { status } });
}

/**
 * Clear mock state. Call this in beforeEach.
 */
export function clearMockState(): void {
  mockMessages = [];
  mockProfileHistoryId = '1000';
  mockNextPageToken = undefined;
  mockHistory = {};
  mockSentId = 'sent-msg-1';
  failures.clear();
}

function failIfConfigured(operation: MockOperation): void {
  if (failures.has(operation)) {
    throw failures.get(operation);
  }
}

// Mock gmail.users.getProfile
const mockGetProfile = vi.fn(async () => ({
  data: { emailAddress: 'owner@example.com', historyId: mockProfileHistoryId },
}));

// Mock gmail.users.messages.list
const mockMessagesList = vi.fn(async (_params: { maxResults?: number; pageToken?: string }) => {
  failIfConfigured('list');
  return {
    data: {
      messages: mockMessages.map(m => ({ id: m.id, threadId: m.threadId })),
      nextPageToken: mockNextPageToken,
    },
  };
});

// Mock gmail.users.messages.get
const mockMessagesGet = vi.fn(async (params: { id: string; format?: string }) => {
  const message = mockMessages.find(m => m.id === params.id);
  if (!message) {
    throw httpError(404, 'Requested entity was not found.');
  }
  return { data: message };
});

// Mock gmail.users.messages.modify
const mockMessagesModify = vi.fn(async (params: {
  id: string;
  requestBody: { addLabelIds: string[]; removeLabelIds: string[] };
}) => {
  failIfConfigured('modify');
  return { data: { id: params.id } };
});

// Mock gmail.users.messages.trash
const mockMessagesTrash = vi.fn(async (params: { id: string }) => {
  failIfConfigured('trash');
  return { data: { id: params.id, labelIds: ['TRASH'] } };
});

// Mock gmail.users.messages.untrash
const mockMessagesUntrash = vi.fn(async (params: { id: string }) => {
  failIfConfigured('untrash');
  return { data: { id: params.id, labelIds: ['INBOX'] } };
});

// Mock gmail.users.messages.send
const mockMessagesSend = vi.fn(async (_params: { requestBody: { raw: string; threadId?: string } }) => {
  failIfConfigured('send');
  return { data: { id: mockSentId } };
});

// Mock gmail.users.history.list
const mockHistoryList = vi.fn(async (_params: { startHistoryId: string; pageToken?: string }) => {
  failIfConfigured('history');
  return { data: mockHistory };
});

// Mock gmail object
const mockGmail = {
  users: {
    getProfile: mockGetProfile,
    messages: {
      list: mockMessagesList,
      get: mockMessagesGet,
      modify: mockMessagesModify,
      trash: mockMessagesTrash,
      untrash: mockMessagesUntrash,
      send: mockMessagesSend,
    },
    history: {
      list: mockHistoryList,
    },
  },
};

const mockSetCredentials = vi.fn();

class MockOAuth2 {
  setCredentials = mockSetCredentials;
}

// Mock google object
const mockGoogle = {
  auth: {
    OAuth2: MockOAuth2,
  },
  gmail: vi.fn(() => mockGmail),
};

// Set up the module mock
vi.mock('googleapis', () => ({
  google: mockGoogle,
}));

export {
  mockGoogle,
  mockGetProfile,
  mockMessagesList,
  mockMessagesGet,
  mockMessagesModify,
  mockMessagesTrash,
  mockMessagesUntrash,
  mockMessagesSend,
  mockHistoryList,
  mockSetCredentials,
};
