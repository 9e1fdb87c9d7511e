/**
 * Re-export all dialects for tree-shakeable imports
 */

export {
  MYSQL_TIME_TABLE,
  MySQLDialect,
  MySQLGenerator,
  MySQLParser,
  MySQLTokenizer,
} from "./mysql.js"
export {
  SINGLESTORE_RESERVED_KEYWORDS,
  SINGLESTORE_TIME_TABLE,
  SingleStoreDialect,
  SingleStoreGenerator,
  SingleStoreParser,
  SingleStoreTokenizer,
  type TemporalRule,
  assertTemporalRules,
} from "./singlestore.js"
