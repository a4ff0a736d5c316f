export const DIRECTORY_CONTENT_TYPE = 'text/x-json' as const;
export const ADD_MEMBER_REQUEST_KEY = 'WsRestAddMemberRequest' as const;
export const RESULT_PROBLEM_KEY = 'WsRestResultProblem' as const;
