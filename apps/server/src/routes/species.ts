import { Router } from 'express';
import { SpeciesRegistry, speciesRegistry } from '../species/registry';
import { parseSpeciesInfo } from '../species/types';
import { createLogger } from '../utils/logger';
import { sendError } from './errors';

const log = createLogger('SPECIES');

// GET  /api/species                     -> { species: [...] }
// GET  /api/species/resolve/:name       -> { code }
// GET  /api/species/compare?codes=a,b   -> comparison table
// GET  /api/species/:code               -> SpeciesInfo
// GET  /api/species/:code/labelmap      -> { 0: 'background', 1: ... }
// POST /api/species/:code               -> register or overwrite a custom species

export function createSpeciesRouter(registry: SpeciesRegistry = speciesRegistry) {
  const species = Router();

  species.get('/species', (_, res) => res.json({ species: registry.list() }));

  species.get('/species/resolve/:name', (req, res) => {
    const code = registry.resolve(req.params.name);
    if (code === undefined) {
      return res.status(404).json({ error: 'Unknown species', message: `Cannot resolve '${req.params.name}'` });
    }
    res.json({ code });
  });

  species.get('/species/compare', (req, res) => {
    const raw = req.query.codes;
    const codes = typeof raw === 'string' ? raw.split(',').map(c => c.trim()).filter(Boolean) : [];
    if (codes.length === 0) {
      return res.status(400).json({ error: 'Missing codes', message: 'Pass ?codes=mouse,rat' });
    }
    res.json(registry.compare(codes));
  });

  species.get('/species/:code', (req, res) => {
    const info = registry.has(req.params.code) ? registry.lookup(req.params.code) : undefined;
    if (!info) {
      return res.status(404).json({ error: 'Unknown species', message: `Species '${req.params.code}' not found` });
    }
    res.json(info);
  });

  species.get('/species/:code/labelmap', (req, res) => {
    if (!registry.has(req.params.code)) {
      return res.status(404).json({ error: 'Unknown species', message: `Species '${req.params.code}' not found` });
    }
    res.json(registry.labelmap(req.params.code));
  });

  species.post('/species/:code', (req, res) => {
    try {
      const info = parseSpeciesInfo(req.body);
      const existed = registry.has(req.params.code);
      registry.register(req.params.code, info);
      res.status(existed ? 200 : 201).json({ code: req.params.code.trim().toLowerCase(), overwritten: existed });
    } catch (error) {
      sendError(res, log, error, 'Species registration failed');
    }
  });

  return species;
}
