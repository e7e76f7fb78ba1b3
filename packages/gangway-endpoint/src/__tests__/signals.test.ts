import { readEndpointSignals, locationFromUrl } from '../signals';

const location = { protocol: 'http:', hostname: 'localhost', port: '5173' };

describe('readEndpointSignals', () => {
  it('reads a Vite production build', () => {
    const result = readEndpointSignals({ PROD: true, MODE: 'production', VITE_API_URL: 'http://api:8181' }, location);

    expect(result.production).toBe(true);
    expect(result.apiUrlOverride).toBe('http://api:8181');
  });

  it('treats MODE=production as production even when PROD is unset', () => {
    expect(readEndpointSignals({ MODE: 'production' }, location).production).toBe(true);
  });

  it('reads string flags from process env', () => {
    expect(readEndpointSignals({ PROD: 'true' }, location).production).toBe(true);
    expect(readEndpointSignals({ NODE_ENV: 'production' }, location).production).toBe(true);
    expect(readEndpointSignals({ PROD: 'false', NODE_ENV: 'development' }, location).production).toBe(false);
  });

  it('drops a blank override', () => {
    expect(readEndpointSignals({ VITE_API_URL: '   ' }, location).apiUrlOverride).toBeUndefined();
  });

  it('ignores malformed values instead of throwing', () => {
    const result = readEndpointSignals({ PROD: 42, VITE_API_URL: { host: 'x' } }, location);

    expect(result.production).toBe(false);
    expect(result.apiUrlOverride).toBeUndefined();
  });

  it('copies only the location fields it needs', () => {
    const browserLocation = { ...location, href: 'http://localhost:5173/x' };
    const result = readEndpointSignals({}, browserLocation);

    expect(result.location).toEqual(location);
  });
});

describe('locationFromUrl', () => {
  it('reports an empty port for the protocol default', () => {
    expect(locationFromUrl('https://app.example.test/')).toEqual({
      protocol: 'https:',
      hostname: 'app.example.test',
      port: ''
    });
  });

  it('keeps an explicit port', () => {
    expect(locationFromUrl('http://localhost:5555').port).toBe('5555');
  });
});
