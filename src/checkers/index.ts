export { eagerAssertionMessage } from './eager-assertion-message';
