import { errorResponse, heartbeatStatus } from '../../api/ApiServer';
import {
  ApplicationError,
  InvalidRequestError,
  NotFoundError,
  RateLimitError,
  RuleValidationError,
} from '../../utils/ErrorHandler';
import { NOW } from '../mocks/MarketDataMocks';

describe('ApiServer', () => {
  describe('errorResponse', () => {
    test('should map rule validation failures to 400 with their issues', () => {
      const error = new RuleValidationError('upload', ['type: Invalid enum value']);

      expect(errorResponse(error)).toEqual({
        status: 400,
        body: { error: "Invalid rule document 'upload': type: Invalid enum value", issues: ['type: Invalid enum value'] },
      });
    });

    test('should map lookups and limits to their statuses', () => {
      expect(errorResponse(new NotFoundError('intent', 4)).status).toBe(404);
      expect(errorResponse(new RateLimitError('client', NOW.getTime())).status).toBe(429);
      expect(errorResponse(new InvalidRequestError('bad input')).status).toBe(400);
    });

    test('should pass body-parser client errors through', () => {
      const error = Object.assign(new Error('request entity too large'), { status: 413 });

      expect(errorResponse(error)).toEqual({ status: 413, body: { error: 'request entity too large' } });
    });

    test('should hide unexpected errors', () => {
      expect(errorResponse(new Error('secret detail'))).toEqual({ status: 500, body: { error: 'internal error' } });
      expect(errorResponse(new ApplicationError('boom', 'BOOM', 'high', false))).toEqual({
        status: 500,
        body: { error: 'boom', code: 'BOOM' },
      });
    });
  });

  describe('heartbeatStatus', () => {
    test('should grade the age of the latest signal', () => {
      expect(heartbeatStatus(null, NOW)).toBe('stale');
      expect(heartbeatStatus(new Date(NOW.getTime() - 29_999), NOW)).toBe('ok');
      expect(heartbeatStatus(new Date(NOW.getTime() - 30_000), NOW)).toBe('lagging');
    });
  });
});
