export { fromJsonbObject, toJsonb } from './json-helpers';
export { isSameUuid } from './uuid';
