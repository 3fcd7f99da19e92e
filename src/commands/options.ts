import { BoardRoleSchema, DueDateSchema, LimitSchema, PositionSchema } from '../schemas.js';
import { parseWith } from './context.js';

export const parsePosition = parseWith(PositionSchema);
export const parseLimit = parseWith(LimitSchema);
export const parseRole = parseWith(BoardRoleSchema);
export const parseDueDate = parseWith(DueDateSchema);

export interface ConfirmOptions {
  yes?: boolean;
}
