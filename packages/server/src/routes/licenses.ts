import type { FastifyPluginAsync } from "fastify";
import { enforceRateLimit } from "../rateLimit.js";

interface ValidateQuery {
  plugin_slug: string;
  license_key: string;
}

const validateQuerySchema = {
  type: "object",
  required: ["plugin_slug", "license_key"],
  properties: {
    plugin_slug: { type: "string", minLength: 1 },
    license_key: { type: "string", minLength: 1 },
  },
} as const;

/**
 * Public license validation, called by installed plugins.
 * GET /licenses/validate?plugin_slug=&license_key=
 */
export const licenseRoutes: FastifyPluginAsync = async (fastify) => {
  enforceRateLimit(fastify, "validate");

  fastify.get<{ Querystring: ValidateQuery }>(
    "/licenses/validate",
    { schema: { querystring: validateQuerySchema } },
    async (request, reply) => {
      const { validation, metrics } = fastify.keyturn;
      const result = await validation.validate(request.query.plugin_slug, request.query.license_key);
      metrics.validation(result.kind);

      switch (result.kind) {
        case "plugin_not_found":
          return reply.status(404).send({ valid: false, error: "Plugin not found" });

        case "license_not_found":
          return { valid: false, error: "License not found" };

        case "invalid":
          return { valid: false, status: result.status, reason: result.reason };

        case "valid":
          return {
            valid: true,
            status: result.status,
            email: result.email,
            expires_at: result.expiresAt ? result.expiresAt.toISOString() : null,
            plugin_name: result.pluginName,
          };
      }
    }
  );
};
