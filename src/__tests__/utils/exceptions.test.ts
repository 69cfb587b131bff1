import {
  AppException,
  ErrorCode,
  OutOfRangeException,
  StarterErrors,
  UpstreamDataException,
  ValidationException,
} from '../../utils/exceptions';

describe('exceptions', () => {
  it('names exceptions after their class', () => {
    const err = new ValidationException('bad');

    expect(err).toBeInstanceOf(AppException);
    expect(err.name).toBe('ValidationException');
    expect(err.statusCode).toBe(400);
    expect(err.errorCode).toBe(ErrorCode.VALIDATION_ERROR);
  });

  it('describes an out-of-range depth slot with one-based numbering', () => {
    const err = StarterErrors.outOfRange('WR', 2, 2);

    expect(err).toBeInstanceOf(OutOfRangeException);
    expect(err.message).toBe('Depth chart lists 2 player(s) at WR; cannot fill depth slot 3');
    expect(err).toMatchObject({ position: 'WR', index: 2, available: 2, statusCode: 422 });
  });

  describe('UpstreamDataException', () => {
    it('wraps plain errors with provider, operation and team', () => {
      const cause = new Error('socket hang up');
      const err = UpstreamDataException.fromError('live', 'fetchRecentUsage', cause, 'DET');

      expect(err.message).toBe('[live] fetchRecentUsage (DET): socket hang up');
      expect(err.statusCode).toBe(502);
      expect(err.errorCode).toBe(ErrorCode.UPSTREAM_DATA_ERROR);
      expect(err.originalError).toBe(cause);
    });

    it('wraps non-error values', () => {
      const err = UpstreamDataException.fromError('offline', 'fetchWeather', 'disk full');

      expect(err.message).toBe('[offline] fetchWeather: disk full');
      expect(err.originalError?.message).toBe('disk full');
    });

    it('passes existing upstream errors through unchanged', () => {
      const original = UpstreamDataException.malformed('live', 'fetchWeather', 'wind_mph: Required', 'DAL');

      expect(UpstreamDataException.fromError('live', 'other', original, 'NYG')).toBe(original);
      expect(original.message).toBe('[live] fetchWeather (DAL): Malformed payload: wind_mph: Required');
    });

    it('reports timeouts as 504', () => {
      const err = UpstreamDataException.timeout('live', 'fetchDepthChart', 250);

      expect(err.statusCode).toBe(504);
      expect(err.errorCode).toBe(ErrorCode.UPSTREAM_TIMEOUT);
      expect(err.message).toBe('[live] fetchDepthChart: Request timed out after 250ms');
    });
  });
});
