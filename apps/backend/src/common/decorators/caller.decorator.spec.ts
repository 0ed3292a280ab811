import { toCallContext } from './caller.decorator';
import type { AuthenticatedRequest } from '../guards/api-key.guard';

describe('toCallContext', () => {
  it('should use the account identity as caller', () => {
    const request = {
      account: { identity: 'hospital-1' },
      requestId: 'req-7',
    } as unknown as AuthenticatedRequest;

    expect(toCallContext(request)).toEqual({
      caller: 'hospital-1',
      requestId: 'req-7',
    });
  });
});
