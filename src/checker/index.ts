export { NO_MATCH, defineChecker, describeMatch } from './define';
export { walkTree } from './walker';
export { scanUnit } from './scan';
