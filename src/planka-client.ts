import axios, { AxiosInstance, AxiosError, AxiosAdapter, Method, RawAxiosRequestHeaders } from 'axios';
import * as http from 'http';
import * as https from 'https';
import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_REQUEST_TIMEOUT_MS } from './config.js';
import { PlankaError, PlankaErrorType, errnoCode, isPlankaError } from './errors.js';
import { logger } from './logging/index.js';
import { setupLoggingMiddleware } from './middleware/logging-middleware.js';
import type { BoardRole } from './schemas.js';

// ============================================
// ENTITY TYPES
// ============================================

export interface PlankaUser {
  id: string;
  name: string;
  username?: string | null;
  email?: string;
  isAdmin?: boolean;
  organization?: string | null;
  phone?: string | null;
}

export interface PlankaProject {
  id: string;
  name: string;
  background?: unknown;
  createdAt?: string;
  updatedAt?: string | null;
}

export interface PlankaBoard {
  id: string;
  projectId: string;
  name: string;
  position: number;
  createdAt?: string;
  updatedAt?: string | null;
}

export interface PlankaList {
  id: string;
  boardId: string;
  name: string;
  position: number;
}

export interface PlankaCard {
  id: string;
  boardId?: string;
  listId: string;
  name: string;
  position: number;
  description?: string | null;
  dueDate?: string | null;
  isDueDateCompleted?: boolean | null;
  creatorUserId?: string;
  coverAttachmentId?: string | null;
  createdAt?: string;
  updatedAt?: string | null;
}

export interface PlankaLabel {
  id: string;
  boardId: string;
  name: string | null;
  color: string;
  position: number;
}

export interface PlankaCardLabel {
  id: string;
  cardId: string;
  labelId: string;
}

export interface PlankaTaskList {
  id: string;
  cardId: string;
  name: string;
  position: number;
}

export interface PlankaTask {
  id: string;
  taskListId?: string;
  cardId?: string;
  name: string;
  position: number;
  isCompleted: boolean;
}

export interface PlankaComment {
  id: string;
  cardId: string;
  userId?: string;
  text: string;
  createdAt?: string;
  updatedAt?: string | null;
}

export interface PlankaAttachment {
  id: string;
  cardId: string;
  name: string;
  url?: string;
  createdAt?: string;
}

export interface PlankaCardMembership {
  id: string;
  cardId: string;
  userId: string;
}

export interface PlankaBoardMembership {
  id: string;
  boardId: string;
  userId: string;
  role: BoardRole;
  canComment?: boolean | null;
}

export interface PlankaNotification {
  id: string;
  type?: string;
  isRead: boolean;
  userId?: string;
  cardId?: string;
  actionId?: string;
  createdAt?: string;
}

export interface PlankaAction {
  id: string;
  type: string;
  userId: string;
  cardId?: string;
  data?: Record<string, unknown>;
  createdAt?: string;
}

export interface PlankaServerConfig {
  oidc?: unknown;
  [key: string]: unknown;
}

// ============================================
// ENVELOPES
// ============================================

export interface ItemEnvelope<T> {
  item: T;
  included?: Record<string, unknown>;
}

export interface ItemsEnvelope<T> {
  items: T[];
  included?: Record<string, unknown>;
}

export interface BoardIncluded {
  users?: PlankaUser[];
  boardMemberships?: PlankaBoardMembership[];
  labels?: PlankaLabel[];
  lists?: PlankaList[];
  cards?: PlankaCard[];
  cardMemberships?: PlankaCardMembership[];
  cardLabels?: PlankaCardLabel[];
  taskLists?: PlankaTaskList[];
  tasks?: PlankaTask[];
  attachments?: PlankaAttachment[];
  projects?: PlankaProject[];
}

export interface BoardEnvelope {
  item: PlankaBoard;
  included?: BoardIncluded;
}

export interface ProjectEnvelope {
  item: PlankaProject;
  included?: {
    users?: PlankaUser[];
    boards?: PlankaBoard[];
    boardMemberships?: PlankaBoardMembership[];
    [key: string]: unknown;
  };
}

export interface ListEnvelope {
  item: PlankaList;
  included?: {
    cards?: PlankaCard[];
    [key: string]: unknown;
  };
}

export interface TaskListEnvelope {
  item: PlankaTaskList;
  included?: {
    tasks?: PlankaTask[];
    [key: string]: unknown;
  };
}

// ============================================
// REQUEST PARAMS
// ============================================

// Fields left undefined are not sent; null is sent and clears the value server-side

export interface UpdateProjectParams {
  name?: string;
}

export interface UpdateBoardParams {
  name?: string;
  position?: number;
}

export interface UpdateListParams {
  name?: string;
  position?: number;
}

export interface CreateCardParams {
  name: string;
  position: number;
  description?: string | null;
  dueDate?: string | null;
}

export interface UpdateCardParams {
  name?: string;
  description?: string | null;
  listId?: string;
  boardId?: string;
  position?: number;
  dueDate?: string | null;
  isDueDateCompleted?: boolean | null;
}

export interface CreateLabelParams {
  name: string | null;
  color: string;
  position: number;
}

export interface UpdateLabelParams {
  name?: string | null;
  color?: string;
  position?: number;
}

export interface UpdateTaskListParams {
  name?: string;
  position?: number;
}

export interface UpdateTaskParams {
  name?: string;
  position?: number;
  isCompleted?: boolean;
}

export interface UpdateAttachmentParams {
  name?: string;
}

export interface UpdateBoardMembershipParams {
  role?: BoardRole;
  canComment?: boolean | null;
}

export interface CreateUserParams {
  email: string;
  password: string;
  name: string;
  username?: string;
}

export interface UpdateUserParams {
  name?: string;
  username?: string | null;
  email?: string;
  isAdmin?: boolean;
  phone?: string | null;
  organization?: string | null;
}

export interface UpdateNotificationParams {
  isRead?: boolean;
}

export type JsonBody = Record<string, unknown>;

export interface PlankaClientOptions {
  timeoutMs?: number;
  // Swaps the HTTP transport; tests pass an in-process stand-in for the server
  adapter?: AxiosAdapter;
}

export const ATTACHMENT_FIELD = 'file';

// Drops keys whose value is undefined; null survives
export function compact(fields: JsonBody): JsonBody {
  return Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined));
}

function serverMessage(data: unknown): string | undefined {
  if (typeof data === 'string' && data.trim() !== '') return data.trim();
  if (typeof data === 'object' && data !== null && 'message' in data && typeof data.message === 'string') {
    return data.message;
  }
  return undefined;
}

// ============================================
// PLANKA CLIENT
// ============================================

export class PlankaClient {
  readonly baseUrl: string;
  private accessToken?: string;
  private client: AxiosInstance;
  private httpAgent: http.Agent;
  private httpsAgent: https.Agent;
  private readonly timeoutMs: number;

  constructor(baseUrl: string, token?: string, options: PlankaClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.accessToken = token;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

    // One keep-alive connection pool per command, released by close()
    this.httpAgent = new http.Agent({ keepAlive: true });
    this.httpsAgent = new https.Agent({ keepAlive: true });

    this.client = axios.create({
      baseURL: this.baseUrl,
      timeout: this.timeoutMs,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });

    // Logging runs before error mapping so it still sees the AxiosError
    setupLoggingMiddleware(this.client);

    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        throw this.handleAxiosError(error);
      }
    );

    logger.setSecret(token);
    logger.debug('PlankaClient initialized', {
      base_url: this.baseUrl,
      authenticated: token !== undefined,
      timeout: this.timeoutMs,
    }, 'planka-client');
  }

  get token(): string | undefined {
    return this.accessToken;
  }

  private handleAxiosError(error: unknown): unknown {
    if (!axios.isAxiosError(error)) {
      return error;
    }

    // Timeout error
    if (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT) {
      return new PlankaError(
        PlankaErrorType.TIMEOUT,
        `Request timeout after ${this.timeoutMs}ms`,
        { cause: error, hint: 'Check that the Planka server is reachable or raise PLANKA_REQUEST_TIMEOUT_MS' }
      );
    }

    // Network error (no response from server)
    if (!error.response) {
      return new PlankaError(
        PlankaErrorType.NETWORK_ERROR,
        error.message || 'Network error occurred',
        { cause: error, details: { code: error.code }, hint: `Check your connection and the server URL (${this.baseUrl})` }
      );
    }

    const status = error.response.status;
    const data: unknown = error.response.data;
    const fromServer = serverMessage(data);

    const errorMap: Record<number, [PlankaErrorType, string, string]> = {
      400: [PlankaErrorType.API_ERROR, 'Bad request', 'Check the command arguments'],
      401: [PlankaErrorType.AUTH_ERROR, 'Authentication failed', 'Run `planka login` to get a new token'],
      403: [PlankaErrorType.AUTH_ERROR, 'Insufficient permissions', 'Your account is not allowed to perform this action'],
      404: [PlankaErrorType.API_ERROR, 'Resource not found', 'Check that the ID is correct'],
      409: [PlankaErrorType.API_ERROR, 'Conflict', 'The resource already exists or was changed concurrently'],
      422: [PlankaErrorType.API_ERROR, 'Validation error', 'Check the command arguments'],
    };

    const [type, label, hint] = errorMap[status] ?? [
      PlankaErrorType.API_ERROR,
      status >= 500 ? 'Planka server error' : 'Request failed',
      status >= 500 ? 'The Planka server is experiencing issues. Try again later.' : undefined,
    ];

    return new PlankaError(
      type,
      `${label} (${status})${fromServer ? `: ${fromServer}` : ''}`,
      { status, details: data, hint, cause: error }
    );
  }

  private headers(): RawAxiosRequestHeaders {
    const headers: RawAxiosRequestHeaders = { 'Content-Type': 'application/json' };
    if (this.accessToken) {
      headers['Authorization'] = `Bearer ${this.accessToken}`;
    }
    return headers;
  }

  private async request<T>(method: Method, url: string, body?: JsonBody): Promise<T> {
    const response = await this.client.request<T>({
      method,
      url,
      data: body,
      headers: this.headers(),
    });
    return response.data;
  }

  private get<T>(url: string): Promise<T> {
    return this.request<T>('GET', url);
  }

  private post<T>(url: string, body: JsonBody = {}): Promise<T> {
    return this.request<T>('POST', url, compact(body));
  }

  private patch<T>(url: string, body: JsonBody): Promise<T> {
    return this.request<T>('PATCH', url, compact(body));
  }

  private delete<T>(url: string): Promise<T> {
    return this.request<T>('DELETE', url);
  }

  private async upload<T>(url: string, filePath: string): Promise<T> {
    let content: Buffer;
    try {
      content = await fs.promises.readFile(filePath);
    } catch (error) {
      const code = errnoCode(error);
      throw new PlankaError(
        PlankaErrorType.IO_ERROR,
        `Could not read ${filePath}${code ? ` (${code})` : ''}`,
        { cause: error, hint: code === 'ENOENT' ? 'Check the file path' : undefined }
      );
    }

    const form = new FormData();
    form.append(ATTACHMENT_FIELD, new Blob([content]), path.basename(filePath));

    // Never the JSON content type; the http adapter appends the boundary
    const headers: RawAxiosRequestHeaders = { 'Content-Type': 'multipart/form-data' };
    if (this.accessToken) {
      headers['Authorization'] = `Bearer ${this.accessToken}`;
    }

    const response = await this.client.post<T>(url, form, { headers });
    return response.data;
  }

  // Authentication
  async login(emailOrUsername: string, password: string): Promise<string> {
    let envelope: ItemEnvelope<string>;
    try {
      const response = await this.client.post<ItemEnvelope<string>>(
        '/api/access-tokens',
        { emailOrUsername, password },
        { headers: { 'Content-Type': 'application/json' } }
      );
      envelope = response.data;
    } catch (error) {
      if (isPlankaError(error)) {
        throw new PlankaError(PlankaErrorType.AUTH_ERROR, `Login failed: ${error.message}`, {
          status: error.status,
          details: error.details,
          hint: error.status !== undefined ? 'Check your username and password' : error.hint,
          cause: error,
        });
      }
      throw error;
    }

    this.accessToken = envelope.item;
    logger.setSecret(this.accessToken);
    logger.info('Logged in', { base_url: this.baseUrl }, 'planka-client');
    return envelope.item;
  }

  async logout(): Promise<string> {
    return (await this.delete<ItemEnvelope<string>>('/api/access-tokens/me')).item;
  }

  // Projects
  async getProjects(): Promise<PlankaProject[]> {
    return (await this.get<ItemsEnvelope<PlankaProject>>('/api/projects')).items;
  }

  async getProject(projectId: string): Promise<ProjectEnvelope> {
    return this.get<ProjectEnvelope>(`/api/projects/${projectId}`);
  }

  async createProject(name: string): Promise<PlankaProject> {
    return (await this.post<ItemEnvelope<PlankaProject>>('/api/projects', { name })).item;
  }

  async updateProject(projectId: string, params: UpdateProjectParams): Promise<PlankaProject> {
    return (await this.patch<ItemEnvelope<PlankaProject>>(`/api/projects/${projectId}`, { ...params })).item;
  }

  async deleteProject(projectId: string): Promise<PlankaProject> {
    return (await this.delete<ItemEnvelope<PlankaProject>>(`/api/projects/${projectId}`)).item;
  }

  // Boards
  async createBoard(projectId: string, name: string, position: number): Promise<PlankaBoard> {
    return (await this.post<ItemEnvelope<PlankaBoard>>(`/api/projects/${projectId}/boards`, { name, position })).item;
  }

  // Returned whole: `included` carries the board's lists, cards and labels
  async getBoard(boardId: string): Promise<BoardEnvelope> {
    return this.get<BoardEnvelope>(`/api/boards/${boardId}`);
  }

  async updateBoard(boardId: string, params: UpdateBoardParams): Promise<PlankaBoard> {
    return (await this.patch<ItemEnvelope<PlankaBoard>>(`/api/boards/${boardId}`, { ...params })).item;
  }

  async deleteBoard(boardId: string): Promise<PlankaBoard> {
    return (await this.delete<ItemEnvelope<PlankaBoard>>(`/api/boards/${boardId}`)).item;
  }

  // Lists
  async createList(boardId: string, name: string, position: number): Promise<PlankaList> {
    return (await this.post<ItemEnvelope<PlankaList>>(`/api/boards/${boardId}/lists`, { name, position })).item;
  }

  async getList(listId: string): Promise<ListEnvelope> {
    return this.get<ListEnvelope>(`/api/lists/${listId}`);
  }

  async updateList(listId: string, params: UpdateListParams): Promise<PlankaList> {
    return (await this.patch<ItemEnvelope<PlankaList>>(`/api/lists/${listId}`, { ...params })).item;
  }

  async deleteList(listId: string): Promise<PlankaList> {
    return (await this.delete<ItemEnvelope<PlankaList>>(`/api/lists/${listId}`)).item;
  }

  async sortList(listId: string, fieldName?: string): Promise<PlankaList> {
    return (await this.post<ItemEnvelope<PlankaList>>(`/api/lists/${listId}/sort`, { fieldName })).item;
  }

  // Cards
  async createCard(listId: string, params: CreateCardParams): Promise<PlankaCard> {
    return (await this.post<ItemEnvelope<PlankaCard>>(`/api/lists/${listId}/cards`, { ...params })).item;
  }

  async getCards(listId: string): Promise<PlankaCard[]> {
    return (await this.get<ItemsEnvelope<PlankaCard>>(`/api/lists/${listId}/cards`)).items;
  }

  async getCard(cardId: string): Promise<PlankaCard> {
    return (await this.get<ItemEnvelope<PlankaCard>>(`/api/cards/${cardId}`)).item;
  }

  async updateCard(cardId: string, params: UpdateCardParams): Promise<PlankaCard> {
    return (await this.patch<ItemEnvelope<PlankaCard>>(`/api/cards/${cardId}`, { ...params })).item;
  }

  async deleteCard(cardId: string): Promise<PlankaCard> {
    return (await this.delete<ItemEnvelope<PlankaCard>>(`/api/cards/${cardId}`)).item;
  }

  async duplicateCard(cardId: string, position: number): Promise<PlankaCard> {
    return (await this.post<ItemEnvelope<PlankaCard>>(`/api/cards/${cardId}/duplicate`, { position })).item;
  }

  async moveCard(cardId: string, listId: string, position: number): Promise<PlankaCard> {
    return this.updateCard(cardId, { listId, position });
  }

  // Labels
  async createLabel(boardId: string, params: CreateLabelParams): Promise<PlankaLabel> {
    return (await this.post<ItemEnvelope<PlankaLabel>>(`/api/boards/${boardId}/labels`, { ...params })).item;
  }

  async updateLabel(labelId: string, params: UpdateLabelParams): Promise<PlankaLabel> {
    return (await this.patch<ItemEnvelope<PlankaLabel>>(`/api/labels/${labelId}`, { ...params })).item;
  }

  async deleteLabel(labelId: string): Promise<PlankaLabel> {
    return (await this.delete<ItemEnvelope<PlankaLabel>>(`/api/labels/${labelId}`)).item;
  }

  async addLabelToCard(cardId: string, labelId: string): Promise<PlankaCardLabel> {
    return (await this.post<ItemEnvelope<PlankaCardLabel>>(`/api/cards/${cardId}/card-labels`, { labelId })).item;
  }

  async removeLabelFromCard(cardId: string, labelId: string): Promise<PlankaCardLabel> {
    return (await this.delete<ItemEnvelope<PlankaCardLabel>>(`/api/cards/${cardId}/card-labels/labelId:${labelId}`)).item;
  }

  // Task lists
  async createTaskList(cardId: string, name: string, position: number): Promise<PlankaTaskList> {
    return (await this.post<ItemEnvelope<PlankaTaskList>>(`/api/cards/${cardId}/task-lists`, { name, position })).item;
  }

  async getTaskList(taskListId: string): Promise<TaskListEnvelope> {
    return this.get<TaskListEnvelope>(`/api/task-lists/${taskListId}`);
  }

  async updateTaskList(taskListId: string, params: UpdateTaskListParams): Promise<PlankaTaskList> {
    return (await this.patch<ItemEnvelope<PlankaTaskList>>(`/api/task-lists/${taskListId}`, { ...params })).item;
  }

  async deleteTaskList(taskListId: string): Promise<PlankaTaskList> {
    return (await this.delete<ItemEnvelope<PlankaTaskList>>(`/api/task-lists/${taskListId}`)).item;
  }

  // Tasks
  async createTask(taskListId: string, name: string, position: number): Promise<PlankaTask> {
    return (await this.post<ItemEnvelope<PlankaTask>>(`/api/task-lists/${taskListId}/tasks`, { name, position })).item;
  }

  async updateTask(taskId: string, params: UpdateTaskParams): Promise<PlankaTask> {
    return (await this.patch<ItemEnvelope<PlankaTask>>(`/api/tasks/${taskId}`, { ...params })).item;
  }

  async deleteTask(taskId: string): Promise<PlankaTask> {
    return (await this.delete<ItemEnvelope<PlankaTask>>(`/api/tasks/${taskId}`)).item;
  }

  // Comments
  async createComment(cardId: string, text: string): Promise<PlankaComment> {
    return (await this.post<ItemEnvelope<PlankaComment>>(`/api/cards/${cardId}/comments`, { text })).item;
  }

  async getComments(cardId: string): Promise<PlankaComment[]> {
    return (await this.get<ItemsEnvelope<PlankaComment>>(`/api/cards/${cardId}/comments`)).items;
  }

  async updateComment(commentId: string, text: string): Promise<PlankaComment> {
    return (await this.patch<ItemEnvelope<PlankaComment>>(`/api/comments/${commentId}`, { text })).item;
  }

  async deleteComment(commentId: string): Promise<PlankaComment> {
    return (await this.delete<ItemEnvelope<PlankaComment>>(`/api/comments/${commentId}`)).item;
  }

  // Attachments
  async createAttachment(cardId: string, filePath: string): Promise<PlankaAttachment> {
    return (await this.upload<ItemEnvelope<PlankaAttachment>>(`/api/cards/${cardId}/attachments`, filePath)).item;
  }

  async updateAttachment(attachmentId: string, params: UpdateAttachmentParams): Promise<PlankaAttachment> {
    return (await this.patch<ItemEnvelope<PlankaAttachment>>(`/api/attachments/${attachmentId}`, { ...params })).item;
  }

  async deleteAttachment(attachmentId: string): Promise<PlankaAttachment> {
    return (await this.delete<ItemEnvelope<PlankaAttachment>>(`/api/attachments/${attachmentId}`)).item;
  }

  // Card memberships
  async addMemberToCard(cardId: string, userId: string): Promise<PlankaCardMembership> {
    return (await this.post<ItemEnvelope<PlankaCardMembership>>(`/api/cards/${cardId}/card-memberships`, { userId })).item;
  }

  async removeMemberFromCard(cardId: string, userId: string): Promise<PlankaCardMembership> {
    return (await this.delete<ItemEnvelope<PlankaCardMembership>>(`/api/cards/${cardId}/card-memberships/userId:${userId}`)).item;
  }

  // Board memberships
  async addMemberToBoard(boardId: string, userId: string, role: BoardRole = 'editor'): Promise<PlankaBoardMembership> {
    return (await this.post<ItemEnvelope<PlankaBoardMembership>>(`/api/boards/${boardId}/board-memberships`, { userId, role })).item;
  }

  async updateBoardMembership(membershipId: string, params: UpdateBoardMembershipParams): Promise<PlankaBoardMembership> {
    return (await this.patch<ItemEnvelope<PlankaBoardMembership>>(`/api/board-memberships/${membershipId}`, { ...params })).item;
  }

  async removeBoardMembership(membershipId: string): Promise<PlankaBoardMembership> {
    return (await this.delete<ItemEnvelope<PlankaBoardMembership>>(`/api/board-memberships/${membershipId}`)).item;
  }

  // Users
  async getUsers(): Promise<PlankaUser[]> {
    return (await this.get<ItemsEnvelope<PlankaUser>>('/api/users')).items;
  }

  async getUser(userId: string): Promise<PlankaUser> {
    return (await this.get<ItemEnvelope<PlankaUser>>(`/api/users/${userId}`)).item;
  }

  async createUser(params: CreateUserParams): Promise<PlankaUser> {
    return (await this.post<ItemEnvelope<PlankaUser>>('/api/users', { ...params })).item;
  }

  async updateUser(userId: string, params: UpdateUserParams): Promise<PlankaUser> {
    return (await this.patch<ItemEnvelope<PlankaUser>>(`/api/users/${userId}`, { ...params })).item;
  }

  async deleteUser(userId: string): Promise<PlankaUser> {
    return (await this.delete<ItemEnvelope<PlankaUser>>(`/api/users/${userId}`)).item;
  }

  // Notifications
  async getNotifications(): Promise<PlankaNotification[]> {
    return (await this.get<ItemsEnvelope<PlankaNotification>>('/api/notifications')).items;
  }

  async getNotification(notificationId: string): Promise<PlankaNotification> {
    return (await this.get<ItemEnvelope<PlankaNotification>>(`/api/notifications/${notificationId}`)).item;
  }

  async updateNotification(notificationId: string, params: UpdateNotificationParams): Promise<PlankaNotification> {
    return (await this.patch<ItemEnvelope<PlankaNotification>>(`/api/notifications/${notificationId}`, { ...params })).item;
  }

  async readAllNotifications(): Promise<PlankaNotification[]> {
    return (await this.post<ItemsEnvelope<PlankaNotification>>('/api/notifications/read-all')).items;
  }

  // Actions / activity
  async getBoardActions(boardId: string): Promise<PlankaAction[]> {
    return (await this.get<ItemsEnvelope<PlankaAction>>(`/api/boards/${boardId}/actions`)).items;
  }

  async getCardActions(cardId: string): Promise<PlankaAction[]> {
    return (await this.get<ItemsEnvelope<PlankaAction>>(`/api/cards/${cardId}/actions`)).items;
  }

  // Server config
  async getServerConfig(): Promise<PlankaServerConfig> {
    return (await this.get<ItemEnvelope<PlankaServerConfig>>('/api/config')).item;
  }

  close(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}
