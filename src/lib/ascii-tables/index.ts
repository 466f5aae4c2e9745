export { ASCIITableUtils } from './ascii-table-utils';
export {
  MultiColumnASCIITable,
  type MultiColumnASCIITableOptions,
} from './multi-column-ascii-table';
