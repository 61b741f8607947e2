export { createRunCommand, executeRun } from './run.js';
export { createListCommand, executeList, type ListOptions } from './list.js';
export { createDescribeCommand, executeDescribe } from './describe.js';
