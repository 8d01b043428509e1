import { Pool } from 'pg';
import { createDatabasePool, isPgConstraintViolation } from './database';
import { getInMemoryLogger } from './logger';

describe('Database Unit Tests', () => {
  describe('isPgConstraintViolation', () => {
    it.each(['23505', '23503', '23514'])(
      'returns true for the constraint violation %s',
      (code) => {
        expect(isPgConstraintViolation({ code })).toBe(true);
      },
    );

    it.each([{ code: '40001' }, { code: 23505 }, {}, null, 'error'])(
      'returns false for %p',
      (error) => {
        expect(isPgConstraintViolation(error)).toBe(false);
      },
    );
  });

  describe('createDatabasePool', () => {
    it('should log pool errors', async () => {
      // Arrange
      const [logger, logs] = getInMemoryLogger('database');
      const pool = createDatabasePool({}, logger);

      // Act
      pool.emit('error', new Error('idle client lost'));
      await pool.end();

      // Assert
      expect(pool).toBeInstanceOf(Pool);
      expect(logs).toHaveLength(1);
      expect(logs[0].type).toBe('error');
      expect(logs[0].args[0]).toMatchObject({
        message: 'idle client lost',
        errorCode: 'DB_ERROR',
      });
      expect(logs[0].args[1]).toBe('PostgreSQL pool error');
    });
  });
});
