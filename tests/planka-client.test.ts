import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PlankaClient, compact } from '../src/planka-client.js';
import { PlankaError, PlankaErrorType } from '../src/errors.js';
import { FakePlankaServer } from './helpers/fake-server.js';

const BASE_URL = 'https://planka.test';

async function captureError(promise: Promise<unknown>): Promise<PlankaError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof PlankaError) return error;
    throw error;
  }
  throw new Error('Expected the call to fail');
}

describe('compact', () => {
  it('drops undefined fields and keeps null', () => {
    expect(compact({ name: 'Y', description: undefined, dueDate: null })).toEqual({ name: 'Y', dueDate: null });
  });
});

describe('PlankaClient', () => {
  let server: FakePlankaServer;
  let client: PlankaClient;

  beforeEach(() => {
    server = new FakePlankaServer();
    client = new PlankaClient(`${BASE_URL}/`, 'test-token', { adapter: server.adapter });
  });

  afterEach(() => {
    client.close();
  });

  describe('request construction', () => {
    it('strips the trailing slash from the base URL', () => {
      expect(client.baseUrl).toBe(BASE_URL);
    });

    it('sends JSON content type and bearer token on every call', async () => {
      server.on('GET', '/api/projects', { data: { items: [] } });

      await client.getProjects();

      const request = server.lastRequest;
      expect(request.baseURL).toBe(BASE_URL);
      expect(request.headers.get('Content-Type')).toBe('application/json');
      expect(request.headers.get('Authorization')).toBe('Bearer test-token');
    });

    it('omits the Authorization header without a token', async () => {
      const anonymous = new PlankaClient(BASE_URL, undefined, { adapter: server.adapter });
      server.on('GET', '/api/config', { data: { item: { oidc: null } } });

      await anonymous.getServerConfig();
      anonymous.close();

      expect(server.lastRequest.headers.has('Authorization')).toBe(false);
    });

    it('uses a 30 second timeout unless configured', async () => {
      server.on('GET', '/api/users', { data: { items: [] } });
      await client.getUsers();
      expect(server.lastRequest.timeout).toBe(30000);

      const quick = new PlankaClient(BASE_URL, 'test-token', { adapter: server.adapter, timeoutMs: 500 });
      await quick.getUsers();
      quick.close();
      expect(server.lastRequest.timeout).toBe(500);
    });

    it('creates a card with exactly the supplied fields', async () => {
      server.on('POST', '/api/lists/5/cards', { data: { item: { id: '9', listId: '5', name: 'X', position: 1 } } });

      const card = await client.createCard('5', { name: 'X', position: 1.0 });

      expect(server.lastRequest.method).toBe('POST');
      expect(server.lastRequest.url).toBe('/api/lists/5/cards');
      expect(server.lastRequest.body).toEqual({ name: 'X', position: 1 });
      expect(card).toEqual({ id: '9', listId: '5', name: 'X', position: 1 });
    });

    it('sends only the changed field on a partial card update', async () => {
      server.on('PATCH', '/api/cards/1', { data: { item: { id: '1', name: 'Y' } } });

      await client.updateCard('1', { name: 'Y' });

      expect(server.lastRequest.body).toStrictEqual({ name: 'Y' });
    });

    it('sends null to clear a field', async () => {
      server.on('PATCH', '/api/cards/1', { data: { item: { id: '1' } } });

      await client.updateCard('1', { description: null, dueDate: undefined });

      expect(server.lastRequest.body).toEqual({ description: null });
    });

    it('moves a card by patching listId and position', async () => {
      server.on('PATCH', '/api/cards/7', { data: { item: { id: '7', listId: '3' } } });

      await client.moveCard('7', '3', 65535);

      expect(server.lastRequest.body).toEqual({ listId: '3', position: 65535 });
    });

    it('posts an empty object when an action has no payload', async () => {
      server.on('POST', '/api/notifications/read-all', { data: { items: [] } });

      await client.readAllNotifications();

      expect(server.lastRequest.body).toEqual({});
    });

    it('sends no body on DELETE', async () => {
      server.on('DELETE', '/api/comments/4', { data: { item: { id: '4' } } });

      await client.deleteComment('4');

      expect(server.lastRequest.body).toBeUndefined();
    });
  });

  describe('action table', () => {
    const cases: Array<{
      name: string;
      call: (c: PlankaClient) => Promise<unknown>;
      method: string;
      url: string;
      body?: unknown;
    }> = [
      { name: 'logout', call: (c) => c.logout(), method: 'DELETE', url: '/api/access-tokens/me' },
      { name: 'getProjects', call: (c) => c.getProjects(), method: 'GET', url: '/api/projects' },
      { name: 'getProject', call: (c) => c.getProject('p1'), method: 'GET', url: '/api/projects/p1' },
      { name: 'createProject', call: (c) => c.createProject('Ops'), method: 'POST', url: '/api/projects', body: { name: 'Ops' } },
      { name: 'updateProject', call: (c) => c.updateProject('p1', { name: 'Dev' }), method: 'PATCH', url: '/api/projects/p1', body: { name: 'Dev' } },
      { name: 'deleteProject', call: (c) => c.deleteProject('p1'), method: 'DELETE', url: '/api/projects/p1' },
      { name: 'createBoard', call: (c) => c.createBoard('p1', 'Sprint', 65535), method: 'POST', url: '/api/projects/p1/boards', body: { name: 'Sprint', position: 65535 } },
      { name: 'getBoard', call: (c) => c.getBoard('b1'), method: 'GET', url: '/api/boards/b1' },
      { name: 'updateBoard', call: (c) => c.updateBoard('b1', { position: 2 }), method: 'PATCH', url: '/api/boards/b1', body: { position: 2 } },
      { name: 'deleteBoard', call: (c) => c.deleteBoard('b1'), method: 'DELETE', url: '/api/boards/b1' },
      { name: 'createList', call: (c) => c.createList('b1', 'Todo', 1024), method: 'POST', url: '/api/boards/b1/lists', body: { name: 'Todo', position: 1024 } },
      { name: 'getList', call: (c) => c.getList('l1'), method: 'GET', url: '/api/lists/l1' },
      { name: 'updateList', call: (c) => c.updateList('l1', { name: 'Doing' }), method: 'PATCH', url: '/api/lists/l1', body: { name: 'Doing' } },
      { name: 'deleteList', call: (c) => c.deleteList('l1'), method: 'DELETE', url: '/api/lists/l1' },
      { name: 'sortList', call: (c) => c.sortList('l1', 'name'), method: 'POST', url: '/api/lists/l1/sort', body: { fieldName: 'name' } },
      { name: 'getCards', call: (c) => c.getCards('l1'), method: 'GET', url: '/api/lists/l1/cards' },
      { name: 'getCard', call: (c) => c.getCard('c1'), method: 'GET', url: '/api/cards/c1' },
      { name: 'deleteCard', call: (c) => c.deleteCard('c1'), method: 'DELETE', url: '/api/cards/c1' },
      { name: 'duplicateCard', call: (c) => c.duplicateCard('c1', 100), method: 'POST', url: '/api/cards/c1/duplicate', body: { position: 100 } },
      { name: 'createLabel', call: (c) => c.createLabel('b1', { name: 'Bug', color: 'berry-red', position: 65535 }), method: 'POST', url: '/api/boards/b1/labels', body: { name: 'Bug', color: 'berry-red', position: 65535 } },
      { name: 'updateLabel', call: (c) => c.updateLabel('lb1', { color: 'sunny-grass' }), method: 'PATCH', url: '/api/labels/lb1', body: { color: 'sunny-grass' } },
      { name: 'deleteLabel', call: (c) => c.deleteLabel('lb1'), method: 'DELETE', url: '/api/labels/lb1' },
      { name: 'addLabelToCard', call: (c) => c.addLabelToCard('c1', 'lb1'), method: 'POST', url: '/api/cards/c1/card-labels', body: { labelId: 'lb1' } },
      { name: 'removeLabelFromCard', call: (c) => c.removeLabelFromCard('c1', 'lb1'), method: 'DELETE', url: '/api/cards/c1/card-labels/labelId:lb1' },
      { name: 'createTaskList', call: (c) => c.createTaskList('c1', 'Checklist', 65535), method: 'POST', url: '/api/cards/c1/task-lists', body: { name: 'Checklist', position: 65535 } },
      { name: 'getTaskList', call: (c) => c.getTaskList('tl1'), method: 'GET', url: '/api/task-lists/tl1' },
      { name: 'updateTaskList', call: (c) => c.updateTaskList('tl1', { name: 'QA' }), method: 'PATCH', url: '/api/task-lists/tl1', body: { name: 'QA' } },
      { name: 'deleteTaskList', call: (c) => c.deleteTaskList('tl1'), method: 'DELETE', url: '/api/task-lists/tl1' },
      { name: 'createTask', call: (c) => c.createTask('tl1', 'Write docs', 65535), method: 'POST', url: '/api/task-lists/tl1/tasks', body: { name: 'Write docs', position: 65535 } },
      { name: 'updateTask', call: (c) => c.updateTask('t1', { isCompleted: true }), method: 'PATCH', url: '/api/tasks/t1', body: { isCompleted: true } },
      { name: 'deleteTask', call: (c) => c.deleteTask('t1'), method: 'DELETE', url: '/api/tasks/t1' },
      { name: 'createComment', call: (c) => c.createComment('c1', 'Looks good'), method: 'POST', url: '/api/cards/c1/comments', body: { text: 'Looks good' } },
      { name: 'getComments', call: (c) => c.getComments('c1'), method: 'GET', url: '/api/cards/c1/comments' },
      { name: 'updateComment', call: (c) => c.updateComment('cm1', 'Edited'), method: 'PATCH', url: '/api/comments/cm1', body: { text: 'Edited' } },
      { name: 'updateAttachment', call: (c) => c.updateAttachment('a1', { name: 'report.pdf' }), method: 'PATCH', url: '/api/attachments/a1', body: { name: 'report.pdf' } },
      { name: 'deleteAttachment', call: (c) => c.deleteAttachment('a1'), method: 'DELETE', url: '/api/attachments/a1' },
      { name: 'addMemberToCard', call: (c) => c.addMemberToCard('c1', 'u1'), method: 'POST', url: '/api/cards/c1/card-memberships', body: { userId: 'u1' } },
      { name: 'removeMemberFromCard', call: (c) => c.removeMemberFromCard('c1', 'u1'), method: 'DELETE', url: '/api/cards/c1/card-memberships/userId:u1' },
      { name: 'addMemberToBoard', call: (c) => c.addMemberToBoard('b1', 'u1'), method: 'POST', url: '/api/boards/b1/board-memberships', body: { userId: 'u1', role: 'editor' } },
      { name: 'updateBoardMembership', call: (c) => c.updateBoardMembership('bm1', { role: 'viewer', canComment: true }), method: 'PATCH', url: '/api/board-memberships/bm1', body: { role: 'viewer', canComment: true } },
      { name: 'removeBoardMembership', call: (c) => c.removeBoardMembership('bm1'), method: 'DELETE', url: '/api/board-memberships/bm1' },
      { name: 'getUsers', call: (c) => c.getUsers(), method: 'GET', url: '/api/users' },
      { name: 'getUser', call: (c) => c.getUser('u1'), method: 'GET', url: '/api/users/u1' },
      { name: 'createUser', call: (c) => c.createUser({ email: 'dev@example.com', password: 'test-password', name: 'Dev' }), method: 'POST', url: '/api/users', body: { email: 'dev@example.com', password: 'test-password', name: 'Dev' } },
      { name: 'updateUser', call: (c) => c.updateUser('u1', { isAdmin: false }), method: 'PATCH', url: '/api/users/u1', body: { isAdmin: false } },
      { name: 'deleteUser', call: (c) => c.deleteUser('u1'), method: 'DELETE', url: '/api/users/u1' },
      { name: 'getNotifications', call: (c) => c.getNotifications(), method: 'GET', url: '/api/notifications' },
      { name: 'getNotification', call: (c) => c.getNotification('n1'), method: 'GET', url: '/api/notifications/n1' },
      { name: 'updateNotification', call: (c) => c.updateNotification('n1', { isRead: true }), method: 'PATCH', url: '/api/notifications/n1', body: { isRead: true } },
      { name: 'getBoardActions', call: (c) => c.getBoardActions('b1'), method: 'GET', url: '/api/boards/b1/actions' },
      { name: 'getCardActions', call: (c) => c.getCardActions('c1'), method: 'GET', url: '/api/cards/c1/actions' },
      { name: 'getServerConfig', call: (c) => c.getServerConfig(), method: 'GET', url: '/api/config' },
    ];

    it.each(cases)('$name → $method $url', async ({ call, method, url, body }) => {
      server.on(method, url, { data: { item: {}, items: [] } });

      await call(client);

      expect(server.requests).toHaveLength(1);
      expect(server.lastRequest.method).toBe(method);
      expect(server.lastRequest.url).toBe(url);
      if (body !== undefined) {
        expect(server.lastRequest.body).toEqual(body);
      }
    });
  });

  describe('envelope unwrapping', () => {
    it('returns items for collections', async () => {
      server.on('GET', '/api/cards/c1/comments', {
        data: { items: [{ id: 'cm1', cardId: 'c1', text: 'hi' }], included: { users: [] } },
      });

      expect(await client.getComments('c1')).toEqual([{ id: 'cm1', cardId: 'c1', text: 'hi' }]);
    });

    it('returns the whole body for board retrieval', async () => {
      const body = {
        item: { id: 'b1', projectId: 'p1', name: 'Sprint', position: 1 },
        included: { lists: [{ id: 'l1', boardId: 'b1', name: 'Todo', position: 1 }], cards: [] },
      };
      server.on('GET', '/api/boards/b1', { data: body });

      expect(await client.getBoard('b1')).toEqual(body);
    });
  });

  describe('login', () => {
    it('stores and returns the token from the item field', async () => {
      const anonymous = new PlankaClient(BASE_URL, undefined, { adapter: server.adapter });
      server.on('POST', '/api/access-tokens', { data: { item: 'tok123' } });

      const token = await anonymous.login('a@b.com', 'pw');

      expect(token).toBe('tok123');
      expect(anonymous.token).toBe('tok123');
      expect(server.lastRequest.body).toEqual({ emailOrUsername: 'a@b.com', password: 'pw' });
      expect(server.lastRequest.headers.has('Authorization')).toBe(false);

      server.on('GET', '/api/projects', { data: { items: [] } });
      await anonymous.getProjects();
      anonymous.close();
      expect(server.lastRequest.headers.get('Authorization')).toBe('Bearer tok123');
    });

    it('raises AUTH_ERROR with the server status on rejected credentials', async () => {
      const anonymous = new PlankaClient(BASE_URL, undefined, { adapter: server.adapter });
      server.on('POST', '/api/access-tokens', {
        status: 401,
        data: { code: 'E_UNAUTHORIZED', message: 'Invalid credentials' },
      });

      const error = await captureError(anonymous.login('a@b.com', 'wrong'));
      anonymous.close();

      expect(error.type).toBe(PlankaErrorType.AUTH_ERROR);
      expect(error.status).toBe(401);
      expect(error.message).toBe('Login failed: Authentication failed (401): Invalid credentials');
      expect(anonymous.token).toBeUndefined();
    });

    it('raises AUTH_ERROR when the server is unreachable', async () => {
      server.on('POST', '/api/access-tokens', { fail: 'network' });

      const error = await captureError(client.login('a@b.com', 'pw'));

      expect(error.type).toBe(PlankaErrorType.AUTH_ERROR);
      expect(error.status).toBeUndefined();
      expect(error.cause).toBeInstanceOf(PlankaError);
    });
  });

  describe('errors', () => {
    it('maps 404 to API_ERROR with status and body', async () => {
      server.on('GET', '/api/cards/missing', { status: 404, data: { code: 'E_NOT_FOUND', message: 'Card not found' } });

      const error = await captureError(client.getCard('missing'));

      expect(error.type).toBe(PlankaErrorType.API_ERROR);
      expect(error.status).toBe(404);
      expect(error.details).toEqual({ code: 'E_NOT_FOUND', message: 'Card not found' });
      expect(error.message).toBe('Resource not found (404): Card not found');
    });

    it('maps 401 and 403 on authenticated calls to AUTH_ERROR', async () => {
      server.on('GET', '/api/users', { status: 401, data: { message: 'Access token is expired' } });
      server.on('GET', '/api/notifications', { status: 403, data: {} });

      expect((await captureError(client.getUsers())).type).toBe(PlankaErrorType.AUTH_ERROR);
      const forbidden = await captureError(client.getNotifications());
      expect(forbidden.type).toBe(PlankaErrorType.AUTH_ERROR);
      expect(forbidden.message).toBe('Insufficient permissions (403)');
    });

    it('maps 5xx to API_ERROR', async () => {
      server.on('POST', '/api/projects', { status: 500, data: 'Internal Server Error' });

      const error = await captureError(client.createProject('Ops'));

      expect(error.type).toBe(PlankaErrorType.API_ERROR);
      expect(error.status).toBe(500);
      expect(error.message).toBe('Planka server error (500): Internal Server Error');
    });

    it('maps a timeout to TIMEOUT without retrying', async () => {
      server.on('GET', '/api/projects', { fail: 'timeout' });

      const error = await captureError(client.getProjects());

      expect(error.type).toBe(PlankaErrorType.TIMEOUT);
      expect(error.message).toBe('Request timeout after 30000ms');
      expect(server.requests).toHaveLength(1);
    });

    it('maps a refused connection to NETWORK_ERROR', async () => {
      server.on('GET', '/api/projects', { fail: 'network' });

      const error = await captureError(client.getProjects());

      expect(error.type).toBe(PlankaErrorType.NETWORK_ERROR);
      expect(error.details).toEqual({ code: 'ECONNREFUSED' });
    });
  });

  describe('attachments', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'planka-upload-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('uploads the file as multipart form data', async () => {
      const file = path.join(tmpDir, 'notes.txt');
      fs.writeFileSync(file, 'hello planka');
      server.on('POST', '/api/cards/c1/attachments', { data: { item: { id: 'a1', cardId: 'c1', name: 'notes.txt' } } });

      const attachment = await client.createAttachment('c1', file);

      const request = server.lastRequest;
      expect(attachment).toEqual({ id: 'a1', cardId: 'c1', name: 'notes.txt' });
      expect(request.headers.get('Content-Type')).toBe('multipart/form-data');
      expect(request.headers.get('Authorization')).toBe('Bearer test-token');
      expect(request.body).toBeInstanceOf(FormData);

      const part = request.body instanceof FormData ? request.body.get('file') : null;
      const uploaded = part instanceof File ? part : undefined;
      expect(uploaded?.name).toBe('notes.txt');
      expect(await uploaded?.text()).toBe('hello planka');
    });

    it('raises IO_ERROR for a missing file without calling the server', async () => {
      const error = await captureError(client.createAttachment('c1', path.join(tmpDir, 'nope.bin')));

      expect(error.type).toBe(PlankaErrorType.IO_ERROR);
      expect(error.message).toContain('(ENOENT)');
      expect(server.requests).toHaveLength(0);
    });
  });

  it('can be closed more than once', () => {
    client.close();
    expect(() => client.close()).not.toThrow();
  });
});
