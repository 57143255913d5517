/**
 * ArcGIS Provider Tests
 *
 * Request construction and response mapping against a stubbed fetch.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { ArcGISProvider } from '../../../providers/arcgis.js';
import { GeocodeError, GeocodeErrorCode } from '../../../core/errors.js';
import { requestedUrl, stubFetch } from '../../utils/mocks.js';

const CANDIDATE_RESPONSE = {
  spatialReference: { wkid: 4326, latestWkid: 4326 },
  candidates: [
    {
      address: '380 New York St, Redlands, California, 92373',
      location: { x: -117.19568, y: 34.05649 },
      score: 100,
      attributes: {},
    },
  ],
};

async function expectGeocodeError(promise: Promise<unknown>, code: GeocodeErrorCode): Promise<void> {
  const error = await promise.then(
    () => null,
    (reason: unknown) => reason
  );
  expect(error).toBeInstanceOf(GeocodeError);
  if (error instanceof GeocodeError) {
    expect(error.code).toBe(code);
    expect(error.provider).toBe('arcgis');
  }
}

describe('ArcGISProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should send a single-line WGS84 request for one candidate', async () => {
    const fetchMock = stubFetch(CANDIDATE_RESPONSE);
    const provider = new ArcGISProvider();

    await provider.geocode('  380 New York St Redlands CA 92373 ');

    const url = requestedUrl(fetchMock);
    expect(`${url.origin}${url.pathname}`).toBe(
      'https://geocode.arcgis.com/arcgis/rest/services/World/GeocodeServer/findAddressCandidates'
    );
    expect(url.searchParams.get('SingleLine')).toBe('380 New York St Redlands CA 92373');
    expect(url.searchParams.get('f')).toBe('json');
    expect(url.searchParams.get('maxLocations')).toBe('1');
    expect(url.searchParams.get('outSR')).toBe('4326');
    expect(url.searchParams.has('token')).toBe(false);
  });

  it('should map location.y to latitude and location.x to longitude', async () => {
    stubFetch(CANDIDATE_RESPONSE);
    const provider = new ArcGISProvider();

    await expect(provider.geocode('380 New York St Redlands CA')).resolves.toEqual({
      latitude: 34.05649,
      longitude: -117.19568,
    });
  });

  it('should use a custom base URL and token', async () => {
    const fetchMock = stubFetch(CANDIDATE_RESPONSE);
    const provider = new ArcGISProvider({
      baseUrl: 'https://gis.example.test/arcgis/rest/services/Locator/GeocodeServer/',
      token: 'test-token',
    });

    await provider.geocode('1 Main St');

    const url = requestedUrl(fetchMock);
    expect(url.pathname).toBe('/arcgis/rest/services/Locator/GeocodeServer/findAddressCandidates');
    expect(url.searchParams.get('token')).toBe('test-token');
  });

  it('should report NOT_FOUND when there are no candidates', async () => {
    stubFetch({ spatialReference: { wkid: 4326 }, candidates: [] });

    await expectGeocodeError(new ArcGISProvider().geocode('nowhere'), GeocodeErrorCode.NOT_FOUND);
  });

  it('should report PROVIDER_ERROR for an error body sent with HTTP 200', async () => {
    stubFetch({ error: { code: 498, message: 'Invalid Token', details: [] } });

    await expectGeocodeError(new ArcGISProvider().geocode('1 Main St'), GeocodeErrorCode.PROVIDER_ERROR);
  });

  it('should report RATE_LIMIT_EXCEEDED for HTTP 429', async () => {
    stubFetch({}, 429);

    await expectGeocodeError(
      new ArcGISProvider().geocode('1 Main St'),
      GeocodeErrorCode.RATE_LIMIT_EXCEEDED
    );
  });

  it('should report PROVIDER_ERROR for other HTTP failures', async () => {
    stubFetch({}, 503);

    await expectGeocodeError(new ArcGISProvider().geocode('1 Main St'), GeocodeErrorCode.PROVIDER_ERROR);
  });

  it('should report PROVIDER_ERROR for a malformed candidate', async () => {
    stubFetch({ candidates: [{ location: { x: 'west', y: 34 } }] });

    await expectGeocodeError(new ArcGISProvider().geocode('1 Main St'), GeocodeErrorCode.PROVIDER_ERROR);
  });

  it('should report NETWORK_ERROR when fetch rejects', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    await expectGeocodeError(new ArcGISProvider().geocode('1 Main St'), GeocodeErrorCode.NETWORK_ERROR);
  });

  it('should report TIMEOUT when the request outlives timeoutMs', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_input: string | URL | Request, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              const abort = new Error('This operation was aborted');
              abort.name = 'AbortError';
              reject(abort);
            });
          })
      )
    );

    await expectGeocodeError(
      new ArcGISProvider({ timeoutMs: 10 }).geocode('1 Main St'),
      GeocodeErrorCode.TIMEOUT
    );
  });

  it('should reject a blank address without calling the service', async () => {
    const fetchMock = stubFetch(CANDIDATE_RESPONSE);

    await expectGeocodeError(new ArcGISProvider().geocode('   '), GeocodeErrorCode.INVALID_ADDRESS);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
