import { LOG_LEVELS } from "../logger";
import { INSTITUTION_CODE_PATTERN } from "../plugin_registry/plugin_registry.schemas";

const TargetConfigSchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    enabled: { type: "boolean" },
    intervalSeconds: { type: "integer", minimum: 1 },
  },
};

export const AppConfigInputSchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    logging: {
      type: "object",
      additionalProperties: false,
      properties: {
        level: { type: "string", enum: [...LOG_LEVELS] },
      },
    },
    dataDir: { type: "string", minLength: 1 },
    plugins: {
      type: "object",
      additionalProperties: false,
      properties: {
        indexUrl: { type: "string", anyOf: [{ maxLength: 0 }, { format: "uri" }] },
        mirrorPrefix: { type: "string" },
        autoUpdate: { type: "boolean" },
        requestTimeoutMs: { type: "integer", minimum: 1 },
      },
    },
    scheduler: {
      type: "object",
      additionalProperties: false,
      properties: {
        maxRetries: { type: "integer", minimum: 0 },
        baseBackoffMs: { type: "integer", minimum: 0 },
        maxBackoffMs: { type: "integer", minimum: 0 },
        maxPhaseTimeoutMs: { type: "integer", minimum: 1 },
        jitterMs: { type: "integer", minimum: 0 },
      },
    },
    dispatch: {
      type: "object",
      additionalProperties: false,
      properties: {
        timeoutMs: { type: "integer", minimum: 1 },
        sendFullReport: { type: "boolean" },
      },
    },
    semester: {
      type: "object",
      additionalProperties: false,
      properties: {
        firstMonday: { type: "string", format: "date" },
        totalWeeks: { type: "integer", minimum: 1, maximum: 60 },
      },
    },
    accounts: {
      type: "array",
      items: {
        type: "object",
        additionalProperties: false,
        required: ["institutionCode", "username", "password"],
        properties: {
          institutionCode: { type: "string", pattern: INSTITUTION_CODE_PATTERN },
          username: { type: "string", minLength: 1 },
          password: { type: "string" },
          enabled: { type: "boolean" },
          grades: TargetConfigSchema,
          schedule: TargetConfigSchema,
        },
      },
    },
    channels: {
      type: "array",
      items: {
        type: "object",
        additionalProperties: false,
        required: ["name", "type"],
        properties: {
          name: { type: "string", minLength: 1 },
          type: { type: "string", minLength: 1 },
          enabled: { type: "boolean" },
          parameters: {
            type: "object",
            additionalProperties: { type: "string" },
          },
        },
      },
    },
  },
};
