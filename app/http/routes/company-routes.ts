import { Router } from 'express';
import z from 'zod/v3';

import { listQuerySchema, parseId, parseRequest } from '@app/http/request-parsing.js';
import type { ServiceResolver } from '@app/http/request-parsing.js';
import { companyFields, companyPatchFields } from '@app/schemas.js';
import type { CompanyService } from '@app/services/company-service.js';

const CompanyBodySchema = z.object(companyFields);
const CompanyPatchBodySchema = z.object(companyPatchFields);

export function createCompanyRouter(companies: ServiceResolver<CompanyService>): Router {
  const router = Router();

  router.get('/', async function (req, res) {
    const options = parseRequest(listQuerySchema, req.query, 'query parameters');
    res.json(await companies(res).listCompanies(options));
  });

  router.post('/', async function (req, res) {
    const input = parseRequest(CompanyBodySchema, req.body, 'company');
    res.status(201).json(await companies(res).createCompany(input));
  });

  router.get('/:id', async function (req, res) {
    res.json(await companies(res).getCompany(parseId(req.params.id)));
  });

  router.put('/:id', async function (req, res) {
    const id = parseId(req.params.id);
    const patch = parseRequest(CompanyPatchBodySchema, req.body, 'company');
    res.json(await companies(res).updateCompany(id, patch));
  });

  router.delete('/:id', async function (req, res) {
    await companies(res).deleteCompany(parseId(req.params.id));
    res.status(204).end();
  });

  return router;
}
