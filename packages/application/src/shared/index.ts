export { parseInput } from './validation.js';
export { systemClock, newestFirst, lastN, type Clock } from './clock.js';
export { ownerOf, isOwnedBy, type Owner, type RequestContext } from './ownership.js';
