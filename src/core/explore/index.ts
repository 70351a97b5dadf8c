/**
 * Explore module - table listing, description and sampling.
 */
export {
    DEFAULT_SAMPLE_LIMIT,
    listTables,
    describeTable,
    sampleTable,
} from './operations.js';
