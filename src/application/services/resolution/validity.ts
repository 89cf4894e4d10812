import { ElementHandle } from '../../ports/PageQueryPort';
import { errorMessage } from '../../../domain/errors/AppErrors';
import { getLogger } from '../../../infrastructure/logging';

const logger = getLogger('Resolver');

/**
 * The first node of a handle if the handle matches at least one node and that
 * node is visible. Engine errors count as no match.
 */
export async function firstVisible(handle: ElementHandle): Promise<ElementHandle | null> {
  try {
    if ((await handle.count()) === 0) {
      return null;
    }
    const first = handle.first();
    return (await first.isVisible()) ? first : null;
  } catch (error) {
    logger.debug('Candidate check failed', { handle: handle.label, error: errorMessage(error) });
    return null;
  }
}
