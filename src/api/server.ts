import express, { type ErrorRequestHandler, type Request, type Response } from 'express';
import cors from 'cors';
import type { PlaceStore, SnapshotUpdate } from '../services/PlaceStore';
import type { SavedPlace } from '../types/Place';
import { placeCoordinates } from '../utils/placeUtils';
import { logger } from '../utils/logger';
import {
  DetailsParamsSchema,
  ListPinsParamsSchema,
  NearParamsSchema,
  SEARCH_LOOKAHEAD,
  SearchParamsSchema,
  paginate,
  parseParams,
} from './params';

const MAPS_URL = 'https://maps.google.com/';

function mapsUrl(latitude: number, longitude: number): string {
  return `${MAPS_URL}?q=${latitude},${longitude}`;
}

interface PlaceLinks {
  direct?: string;
  maps?: string;
  placeId?: string;
}

function placeLinks(place: SavedPlace): PlaceLinks {
  const links: PlaceLinks = {};
  const coordinates = placeCoordinates(place);

  if (place.url) {
    links.direct = place.url;
  }
  if (coordinates) {
    links.maps = mapsUrl(coordinates.latitude, coordinates.longitude);
  }
  if (place.place_id) {
    links.placeId = `${MAPS_URL}place?q=place_id:${place.place_id}`;
  }
  return links;
}

/**
 * The single link shown beside a pin in a listing: its own URL, else a Maps
 * URL for its coordinates
 */
function pinLink(place: SavedPlace): string | undefined {
  if (place.url) {
    return place.url;
  }
  const coordinates = placeCoordinates(place);
  return coordinates ? mapsUrl(coordinates.latitude, coordinates.longitude) : undefined;
}

function withPinLinks(places: SavedPlace[], withLinks: boolean): Array<SavedPlace & { link?: string }> {
  return withLinks ? places.map((place) => ({ ...place, link: pinLink(place) })) : places;
}

function sendValidationError(res: Response, error: string): void {
  res.status(400).json({ success: false, error });
}

export function createServer(store: PlaceStore) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  // Lists with their pin counts
  app.get('/api/lists', (_req: Request, res: Response) => {
    const engine = store.query();
    const lists = engine.getAllLists().map((list) => ({
      ...list,
      pinCount: engine.getPinsByList(list.name).length,
    }));

    res.json({
      success: true,
      count: lists.length,
      lists,
    });
  });

  // All pins, or one list's pins, paginated
  app.get('/api/pins', (req: Request, res: Response) => {
    const params = parseParams(ListPinsParamsSchema, req.query);
    if (!params.ok) {
      sendValidationError(res, params.error);
      return;
    }

    const { list, limit, offset, withLinks } = params.data;
    const engine = store.query();

    if (list && !engine.getListNames().includes(list)) {
      res.status(404).json({
        success: false,
        error: `List '${list}' not found`,
        available: engine.getListNames(),
      });
      return;
    }

    const pins = list ? engine.getPinsByList(list) : engine.getAllPins();
    const page = paginate(pins, limit, offset);

    res.json({
      success: true,
      list: list ?? null,
      count: page.items.length,
      total: page.total,
      offset,
      limit,
      message: page.message,
      data: withPinLinks(page.items, withLinks),
    });
  });

  app.get('/api/pins/search', (req: Request, res: Response) => {
    const params = parseParams(SearchParamsSchema, req.query);
    if (!params.ok) {
      sendValidationError(res, params.error);
      return;
    }

    const { q, limit, offset, withLinks } = params.data;
    const matches = store.query().searchPlaces(q, limit + offset + SEARCH_LOOKAHEAD);
    const page = paginate(matches, limit, offset);

    res.json({
      success: true,
      query: q,
      count: page.items.length,
      total: page.total,
      offset,
      limit,
      message: page.message,
      data: withPinLinks(page.items, withLinks),
    });
  });

  app.get('/api/pins/near', (req: Request, res: Response) => {
    const params = parseParams(NearParamsSchema, req.query);
    if (!params.ok) {
      sendValidationError(res, params.error);
      return;
    }

    const { lat, lng, radiusKm, limit, offset, withLinks } = params.data;
    const nearby = store.query().getPlacesNear(lat, lng, radiusKm);
    const page = paginate(nearby, limit, offset);

    res.json({
      success: true,
      center: { latitude: lat, longitude: lng },
      radiusKm,
      count: page.items.length,
      total: page.total,
      offset,
      limit,
      message: page.message,
      data: withPinLinks(page.items, withLinks),
    });
  });

  app.get('/api/pins/details', (req: Request, res: Response) => {
    const params = parseParams(DetailsParamsSchema, req.query);
    if (!params.ok) {
      sendValidationError(res, params.error);
      return;
    }

    const { name } = params.data;
    const { pin, suggestions } = store.query().findPin(name);

    if (!pin) {
      res.status(404).json({
        success: false,
        error: `Not found: '${name}'`,
        suggestions,
      });
      return;
    }

    res.json({
      success: true,
      data: pin,
      links: placeLinks(pin),
    });
  });

  app.get('/api/pins/place/:placeId', (req: Request, res: Response) => {
    const pin = store.query().getPinByPlaceId(req.params.placeId);
    if (!pin) {
      res.status(404).json({
        success: false,
        error: `No pin with place id '${req.params.placeId}'`,
      });
      return;
    }

    res.json({
      success: true,
      data: pin,
      links: placeLinks(pin),
    });
  });

  app.get('/api/categories', (_req: Request, res: Response) => {
    const categories = store.query().getAllCategories();
    res.json({
      success: true,
      count: categories.length,
      categories,
    });
  });

  app.get('/api/categories/:category', (req: Request, res: Response) => {
    const pins = store.query().getPlacesByCategory(req.params.category);
    res.json({
      success: true,
      category: req.params.category,
      count: pins.length,
      data: pins,
    });
  });

  app.get('/api/stats', (_req: Request, res: Response) => {
    const snapshot = store.getSnapshot();
    res.json({
      success: true,
      version: snapshot.version,
      loadedAt: snapshot.loadedAt,
      warnings: snapshot.warnings,
      ...store.query().getStats(),
    });
  });

  // Rebuild the collection from the data path
  app.post('/api/reload', (_req: Request, res: Response) => {
    try {
      const snapshot = store.reload();
      res.json({
        success: true,
        version: snapshot.version,
        count: snapshot.places.length,
        lists: snapshot.lists.length,
        warnings: snapshot.warnings,
      });
    } catch (error) {
      logger.error({ error }, 'Error reloading places');
      res.status(500).json({
        success: false,
        error: 'Failed to reload places',
      });
    }
  });

  // Server-Sent Events (SSE) endpoint announcing snapshot swaps
  app.get('/api/stream', (req: Request, res: Response) => {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no'); // Disable buffering in nginx

    const clientId = `client-${Date.now()}-${Math.random()}`;
    const send = (event: Record<string, unknown>) => {
      res.write(`data: ${JSON.stringify({ ...event, timestamp: new Date() })}\n\n`);
    };
    const onSnapshotUpdated = (update: SnapshotUpdate) => {
      send({ type: 'snapshot-updated', ...update });
    };

    store.on('snapshot-updated', onSnapshotUpdated);
    logger.info({ clientId, totalClients: store.listenerCount('snapshot-updated') }, 'SSE client connected');

    send({ type: 'connected', clientId, version: store.getSnapshot().version });

    // Send heartbeat every 30 seconds to keep connection alive
    const heartbeat = setInterval(() => {
      send({ type: 'heartbeat' });
    }, 30000);

    req.on('close', () => {
      clearInterval(heartbeat);
      store.off('snapshot-updated', onSnapshotUpdated);
      logger.info({ clientId, remainingClients: store.listenerCount('snapshot-updated') }, 'SSE client disconnected');
    });
  });

  // Anything a route throws ends up here
  const handleRouteError: ErrorRequestHandler = (error, req, res, next) => {
    logger.error({ error, method: req.method, path: req.path }, 'Unhandled route error');
    if (res.headersSent) {
      next(error);
      return;
    }
    res.status(500).json({
      success: false,
      error: 'Internal server error',
    });
  };
  app.use(handleRouteError);

  return app;
}
