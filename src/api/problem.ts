import type { FieldIssue } from '../core/errors.js';

/** RFC 9457 problem details, plus the error code and request id. */
export interface Problem {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  code: string;
  requestId?: string;
  errors?: FieldIssue[];
}

export const PROBLEM_CONTENT_TYPE = 'application/problem+json';

export function problem(params: Omit<Problem, 'type' | 'title'>): Problem {
  return {
    type: `https://errors.lexlocator.local/${params.code.toLowerCase().replace(/_/g, '-')}`,
    title: codeToTitle(params.code),
    status: params.status,
    detail: params.detail,
    instance: params.instance,
    code: params.code,
    requestId: params.requestId,
    errors: params.errors,
  };
}

function codeToTitle(code: string): string {
  switch (code) {
    case 'INVALID_ARGUMENT':
      return 'Invalid argument';
    case 'UNSUPPORTED_MEDIA_TYPE':
      return 'Unsupported media type';
    case 'UNPROCESSABLE_ENTITY':
      return 'Unprocessable entity';
    case 'NOT_FOUND':
      return 'Not found';
    case 'ITERATION_LIMIT_EXCEEDED':
      return 'Justification not found within the iteration limit';
    case 'METHOD_NOT_ALLOWED':
      return 'Method not allowed';
    case 'MALFORMED_TERMINAL_PAYLOAD':
      return 'Malformed reasoning output';
    default:
      return 'Internal error';
  }
}
