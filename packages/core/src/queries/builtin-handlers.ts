import type { QueryHandlers } from './types.js';
import { personHandler } from './handlers/person.handler.js';
import { titleHandler } from './handlers/title.handler.js';
import { entityHandler } from './handlers/entity.handler.js';
import { companyHandler } from './handlers/company.handler.js';
import { wordHandler } from './handlers/word.handler.js';
import { searchHandler } from './handlers/search.handler.js';

export function createBuiltinHandlers(): QueryHandlers {
  return {
    Person: personHandler,
    Title: titleHandler,
    Entity: entityHandler,
    Company: companyHandler,
    Word: wordHandler,
    Search: searchHandler,
  };
}
