import z from 'zod/v3';

import { defineTool } from '@app/mcp-server/tool-registry.js';
import type { ToolRegistry } from '@app/mcp-server/tool-registry.js';
import {
  companyFields,
  companyPatchFields,
  companyShape,
  deletedShape,
  listFields,
  pageShape,
} from '@app/schemas.js';
import type { CompanyService } from '@app/services/company-service.js';

const companyId = z.number().int().positive().describe('Company id');

export function defineCompanyTools(registry: ToolRegistry, companies: CompanyService): void {
  registry.register(defineTool({
    name: 'create_company',
    group: 'company',
    title: 'Create company',
    description: 'Create a company that issues or receives invoices.',
    inputSchema: companyFields,
    outputSchema: companyShape,
    invoke: function (input) {
      return companies.createCompany(input);
    },
  }));

  registry.register(defineTool({
    name: 'list_companies',
    group: 'company',
    title: 'List companies',
    description: 'List companies ordered by name, optionally filtered by a keyword matched against name, email and notes.',
    inputSchema: listFields,
    outputSchema: pageShape(companyShape),
    invoke: function (input) {
      return companies.listCompanies(input);
    },
  }));

  registry.register(defineTool({
    name: 'get_company',
    group: 'company',
    title: 'Get company',
    description: 'Get one company by id.',
    inputSchema: { companyId },
    outputSchema: companyShape,
    invoke: function (input) {
      return companies.getCompany(input.companyId);
    },
  }));

  registry.register(defineTool({
    name: 'update_company',
    group: 'company',
    title: 'Update company',
    description: 'Update the given fields of a company. Omitted fields keep their value; null clears an optional field.',
    inputSchema: { companyId, ...companyPatchFields },
    outputSchema: companyShape,
    invoke: function ({ companyId, ...patch }) {
      return companies.updateCompany(companyId, patch);
    },
  }));

  registry.register(defineTool({
    name: 'delete_company',
    group: 'company',
    title: 'Delete company',
    description: 'Delete a company. Fails with a conflict while any invoice still references it.',
    inputSchema: { companyId },
    outputSchema: deletedShape,
    invoke: async function (input) {
      await companies.deleteCompany(input.companyId);
      return { deleted: true as const, id: input.companyId };
    },
  }));
}
