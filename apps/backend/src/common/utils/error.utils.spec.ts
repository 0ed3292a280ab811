import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  GoneException,
  NotFoundException,
} from '@nestjs/common';
import {
  extractErrorInfo,
  toHttpException,
  unwrapResult,
} from './error.utils';

describe('Error Utils', () => {
  describe('extractErrorInfo', () => {
    it('should extract message and stack from Error instances', () => {
      const error = new Error('boom');

      const info = extractErrorInfo(error);

      expect(info.message).toBe('boom');
      expect(info.stack).toBe(error.stack);
    });

    it('should pass strings through as the message', () => {
      expect(extractErrorInfo('plain failure')).toEqual({
        message: 'plain failure',
        stack: undefined,
      });
    });

    it('should serialize other values', () => {
      expect(extractErrorInfo({ code: 'ECONNREFUSED' })).toEqual({
        message: '{"code":"ECONNREFUSED"}',
        stack: undefined,
      });
    });
  });

  describe('toHttpException', () => {
    it.each([
      ['Unauthorized', ForbiddenException, 403],
      ['AlreadyExists', ConflictException, 409],
      ['NotFound', NotFoundException, 404],
      ['InvalidInput', BadRequestException, 400],
      ['Expired', GoneException, 410],
    ] as const)('should map %s to %p', (code, type, status) => {
      const exception = toHttpException(code, 'reason text');

      expect(exception).toBeInstanceOf(type);
      expect(exception.getStatus()).toBe(status);
      expect(exception.message).toBe('reason text');
    });
  });

  describe('unwrapResult', () => {
    it('should return the value of a success', () => {
      expect(unwrapResult({ ok: true, value: 4 })).toBe(4);
    });

    it('should throw the mapped exception for a failure', () => {
      expect(() =>
        unwrapResult({
          ok: false,
          code: 'NotFound',
          reason: 'Privilege 9 not found',
        }),
      ).toThrow(new NotFoundException('Privilege 9 not found'));
    });
  });
});
