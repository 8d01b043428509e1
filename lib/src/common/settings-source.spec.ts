import {
  createMutableSettingsSource,
  createStaticSettingsSource,
  isSettingsSource,
} from './settings-source';

describe('settings source', () => {
  it('should always return the static value', () => {
    const value = { host: 'smtp.example.com' };
    const source = createStaticSettingsSource(value);

    expect(source.current()).toBe(value);
  });

  it('should return the updated value', () => {
    // Arrange
    const source = createMutableSettingsSource({ host: 'a.example.com' });

    // Act
    source.update({ host: 'b.example.com' });

    // Assert
    expect(source.current()).toEqual({ host: 'b.example.com' });
  });

  it('should not expose later changes to the passed object', () => {
    const initial = { host: 'a.example.com' };
    const source = createMutableSettingsSource(initial);

    initial.host = 'b.example.com';

    expect(source.current().host).toBe('a.example.com');
  });

  it('should detect a settings source', () => {
    expect(isSettingsSource(createStaticSettingsSource({ a: 1 }))).toBe(true);
    expect(isSettingsSource({ a: 1 })).toBe(false);
  });
});
