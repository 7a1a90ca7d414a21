export { buildRoadsQuery, withOverpassQuery } from './query.js';
