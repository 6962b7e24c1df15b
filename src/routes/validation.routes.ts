import type { FastifyInstance, FastifyReply } from 'fastify';
import type { EmailValidationService } from '../services/email-validation.service.js';
import type { ListKind } from '../types/list.types.js';

export interface ValidationRoutesOptions {
  validationService: EmailValidationService;
  maxBatchSize: number;
  checkMxByDefault: boolean;
}

interface EmailBatchBody {
  emails: string[];
  checkMx?: boolean;
}

const validationResultSchema = {
  type: 'object',
  properties: {
    email: { type: 'string' },
    valid: { type: 'boolean' },
    format: { type: 'boolean' },
    disposable: { type: 'boolean' },
    mx: { type: 'boolean', nullable: true },
    domain: { type: 'string', nullable: true },
    errors: { type: 'array', items: { type: 'string' } },
  },
} as const;

const errorSchema = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    message: { type: 'string' },
  },
} as const;

const listCountSchema = {
  type: 'object',
  properties: {
    list: { type: 'string' },
    count: { type: 'number' },
  },
} as const;

function emailBatchBodySchema(maxBatchSize: number, withCheckMx = true) {
  return {
    type: 'object',
    required: ['emails'],
    properties: {
      emails: { type: 'array', items: { type: 'string' }, maxItems: maxBatchSize },
      ...(withCheckMx ? { checkMx: { type: 'boolean' } } : {}),
    },
  };
}

export async function validationRoutes(fastify: FastifyInstance, options: ValidationRoutesOptions) {
  const { validationService, maxBatchSize, checkMxByDefault } = options;

  // GET /validate - Validate a single email
  fastify.get<{ Querystring: { email: string; checkMx?: boolean } }>('/validate', {
    schema: {
      description: 'Validate a single email address (format, disposable domain, MX record)',
      tags: ['Validation'],
      querystring: {
        type: 'object',
        required: ['email'],
        properties: {
          email: { type: 'string' },
          checkMx: { type: 'boolean' },
        },
      },
      response: {
        200: validationResultSchema,
        400: errorSchema,
      },
    },
  }, async (request) => {
    const { email, checkMx = checkMxByDefault } = request.query;
    const result = await validationService.validateWithDetails(email, checkMx);
    return { email, ...result };
  });

  // POST /validate/batch - Validate many emails
  fastify.post<{ Body: EmailBatchBody }>('/validate/batch', {
    schema: {
      description: 'Validate a batch of emails; repeated inputs are reported once',
      tags: ['Validation'],
      body: emailBatchBodySchema(maxBatchSize),
      response: {
        200: {
          type: 'object',
          properties: {
            count: { type: 'number' },
            results: { type: 'array', items: validationResultSchema },
          },
        },
        400: errorSchema,
      },
    },
  }, async (request) => {
    const { emails, checkMx = checkMxByDefault } = request.body;
    const results = await validationService.validateMultiple(emails, checkMx);

    return {
      count: results.size,
      results: [...results].map(([email, result]) => ({ email, ...result })),
    };
  });

  // POST /filter/valid - Keep only valid emails
  fastify.post<{ Body: EmailBatchBody }>('/filter/valid', {
    schema: {
      description: 'Return the valid emails of a batch, in input order',
      tags: ['Validation'],
      body: emailBatchBodySchema(maxBatchSize),
    },
  }, async (request) => {
    const { emails, checkMx = checkMxByDefault } = request.body;
    return { emails: await validationService.filterValid(emails, checkMx) };
  });

  // POST /filter/invalid - Keep only invalid emails
  fastify.post<{ Body: EmailBatchBody }>('/filter/invalid', {
    schema: {
      description: 'Return the invalid emails of a batch, in input order',
      tags: ['Validation'],
      body: emailBatchBodySchema(maxBatchSize),
    },
  }, async (request) => {
    const { emails, checkMx = checkMxByDefault } = request.body;
    return { emails: await validationService.filterInvalid(emails, checkMx) };
  });

  // POST /statistics - Aggregate counts over a batch
  fastify.post<{ Body: EmailBatchBody }>('/statistics', {
    schema: {
      description: 'Count valid, invalid, malformed, disposable and MX-less emails',
      tags: ['Validation'],
      body: emailBatchBodySchema(maxBatchSize),
    },
  }, async (request) => {
    const { emails, checkMx = checkMxByDefault } = request.body;
    return validationService.getStatistics(emails, checkMx);
  });

  // POST /normalize - Trim and lowercase emails
  fastify.post<{ Body: { emails: string[] } }>('/normalize', {
    schema: {
      description: 'Trim and lowercase a batch of emails',
      tags: ['Validation'],
      body: emailBatchBodySchema(maxBatchSize, false),
    },
  }, async (request) => {
    return { emails: validationService.normalizeMultiple(request.body.emails) };
  });

  // GET /domains/:domain - Classify a domain
  fastify.get<{ Params: { domain: string } }>('/domains/:domain', {
    schema: {
      description: 'Classify a domain against the block and allow lists',
      tags: ['Lists'],
      response: {
        200: {
          type: 'object',
          properties: {
            domain: { type: 'string' },
            disposable: { type: 'boolean' },
            blocklisted: { type: 'boolean' },
            allowlisted: { type: 'boolean' },
          },
        },
      },
    },
  }, async (request) => {
    const domain = request.params.domain.trim().toLowerCase();

    return {
      domain,
      disposable: validationService.isDisposableDomain(domain),
      blocklisted: validationService.isBlocklistedDomain(domain),
      allowlisted: validationService.isAllowlistedDomain(domain),
    };
  });

  // GET /lists - List sizes
  fastify.get('/lists', {
    schema: {
      description: 'Number of domains in the block and allow lists',
      tags: ['Lists'],
    },
  }, async () => {
    return {
      blocklistCount: validationService.getBlocklistCount(),
      allowlistCount: validationService.getAllowlistCount(),
    };
  });

  const listCount = (list: ListKind) =>
    list === 'blocklist' ? validationService.getBlocklistCount() : validationService.getAllowlistCount();

  for (const list of ['blocklist', 'allowlist'] as const) {
    // POST /lists/:list - Add domains
    fastify.post<{ Body: { domains: string[] } }>(`/lists/${list}`, {
      schema: {
        description: `Add domains to the ${list}`,
        tags: ['Lists'],
        body: {
          type: 'object',
          required: ['domains'],
          properties: {
            domains: { type: 'array', items: { type: 'string', pattern: '\\S' }, maxItems: maxBatchSize },
          },
        },
        response: { 200: listCountSchema, 400: errorSchema },
      },
    }, async (request) => {
      if (list === 'blocklist') {
        validationService.addManyToBlocklist(request.body.domains);
      } else {
        validationService.addManyToAllowlist(request.body.domains);
      }
      return { list, count: listCount(list) };
    });

    // DELETE /lists/:list/:domain - Remove a domain
    fastify.delete<{ Params: { domain: string } }>(`/lists/${list}/:domain`, {
      schema: {
        description: `Remove a domain from the ${list}`,
        tags: ['Lists'],
        response: { 200: listCountSchema },
      },
    }, async (request) => {
      if (list === 'blocklist') {
        validationService.removeFromBlocklist(request.params.domain);
      } else {
        validationService.removeFromAllowlist(request.params.domain);
      }
      return { list, count: listCount(list) };
    });
  }

  // PUT /cache/mx - Toggle MX caching
  fastify.put<{ Body: { enabled: boolean } }>('/cache/mx', {
    schema: {
      description: 'Enable or disable MX caching; existing entries are kept',
      tags: ['Cache'],
      body: {
        type: 'object',
        required: ['enabled'],
        properties: { enabled: { type: 'boolean' } },
      },
    },
  }, async (request) => {
    validationService.setCacheEnabled(request.body.enabled);
    return { enabled: validationService.isCacheEnabled(), size: validationService.getCacheSize() };
  });

  // DELETE /cache/mx - Drop every cached MX answer
  fastify.delete('/cache/mx', {
    schema: {
      description: 'Clear the MX cache',
      tags: ['Cache'],
    },
  }, async (_request, reply: FastifyReply) => {
    validationService.clearCache();
    return reply.code(204).send();
  });
}
