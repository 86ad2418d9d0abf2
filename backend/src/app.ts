/**
 * School Map - Backend API
 * Serves the school list, school GeoJSON and commune political profiles.
 */

import express, { type Express, type Request } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import * as path from 'path';
import { readJsonArtifact } from '../../scripts/lib/cache';
import { describeError } from '../../scripts/lib/errors';
import { politicalArtifactSchema, type PoliticalArtifact } from '../../scripts/lib/political/types';
import { schoolsArtifactSchema, type SchoolRecord } from '../../scripts/lib/types';
import { applyDisplayCap, filterSchools, parseCategories, parseSectors, toFeatureCollection, type SchoolFilter } from './query';

export interface AppOptions {
  dataDir: string;
  /** Read each artifact once instead of on every request */
  cacheArtifacts?: boolean;
  logRequests?: boolean;
}

class ArtifactStore {
  private schools: SchoolRecord[] | null = null;
  private political: PoliticalArtifact | null = null;

  constructor(private readonly dataDir: string, private readonly cache: boolean) {}

  getSchools(): SchoolRecord[] {
    if (this.cache && this.schools) return this.schools;
    const data = readJsonArtifact(path.join(this.dataDir, 'schools.json'), schoolsArtifactSchema);
    if (this.cache) this.schools = data;
    return data;
  }

  getPolitical(): PoliticalArtifact {
    if (this.cache && this.political) return this.political;
    const data = readJsonArtifact(path.join(this.dataDir, 'political_data.json'), politicalArtifactSchema);
    if (this.cache) this.political = data;
    return data;
  }
}

function queryString(req: Request, name: string): string | undefined {
  const v = req.query[name];
  return typeof v === 'string' ? v : undefined;
}

function schoolFilter(req: Request): SchoolFilter {
  const category = queryString(req, 'category');
  const sector = queryString(req, 'sector');
  return {
    categories: category !== undefined ? parseCategories(category) : undefined,
    sectors: sector !== undefined ? parseSectors(sector) : undefined,
    q: queryString(req, 'q'),
  };
}

export function createApp(opts: AppOptions): Express {
  const app = express();
  const store = new ArtifactStore(opts.dataDir, opts.cacheArtifacts ?? false);
  const maxAge = opts.cacheArtifacts ? 3600 : 60;

  app.use(cors());
  if (opts.logRequests ?? true) app.use(morgan('short'));

  app.get('/api/schools', (req, res) => {
    try {
      const schools = filterSchools(store.getSchools(), schoolFilter(req));
      res.set('Cache-Control', `public, max-age=${maxAge}`);
      res.json(schools);
    } catch (e) {
      res.status(500).json({ error: describeError(e) });
    }
  });

  app.get('/api/schools.geojson', (req, res) => {
    try {
      const schools = filterSchools(store.getSchools(), schoolFilter(req));
      res.set('Cache-Control', `public, max-age=${maxAge}`);
      res.type('application/geo+json');
      res.send(JSON.stringify(toFeatureCollection(schools)));
    } catch (e) {
      res.status(500).json({ error: describeError(e) });
    }
  });

  app.get('/api/schools/:uai', (req, res) => {
    try {
      const school = store.getSchools().find((s) => s.uai === req.params.uai);
      if (!school) {
        res.status(404).json({ error: `No school with UAI ${req.params.uai}` });
        return;
      }
      const code = school.address.insee_code;
      const profile = code ? store.getPolitical()[code] : undefined;
      res.json({ ...school, commune_profile: profile ? applyDisplayCap(profile) : null });
    } catch (e) {
      res.status(500).json({ error: describeError(e) });
    }
  });

  app.get('/api/communes/:insee', (req, res) => {
    try {
      const profile = store.getPolitical()[req.params.insee];
      if (!profile) {
        res.status(404).json({ error: `No commune profile for ${req.params.insee}` });
        return;
      }
      res.json(applyDisplayCap(profile));
    } catch (e) {
      res.status(500).json({ error: describeError(e) });
    }
  });

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
