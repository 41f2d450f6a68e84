import * as Joi from 'joi';
import { JSONRPC_VERSION, JsonRpcMessage } from './json-rpc.types';

const requestId = Joi.alternatives().try(Joi.string(), Joi.number().integer());

const requestSchema = Joi.object({
  jsonrpc: Joi.string().valid(JSONRPC_VERSION).required(),
  id: requestId.required(),
  method: Joi.string().min(1).required(),
  params: Joi.object().unknown(true),
});

const notificationSchema = Joi.object({
  jsonrpc: Joi.string().valid(JSONRPC_VERSION).required(),
  method: Joi.string().min(1).required(),
  params: Joi.object().unknown(true),
});

const resultSchema = Joi.object({
  jsonrpc: Joi.string().valid(JSONRPC_VERSION).required(),
  id: requestId.required(),
  result: Joi.object().unknown(true).required(),
});

const errorSchema = Joi.object({
  jsonrpc: Joi.string().valid(JSONRPC_VERSION).required(),
  id: requestId.allow(null).required(),
  error: Joi.object({
    code: Joi.number().integer().required(),
    message: Joi.string().allow('').required(),
    data: Joi.any(),
  }).required(),
});

export const jsonRpcMessageSchema = Joi.alternatives().try(
  requestSchema,
  notificationSchema,
  resultSchema,
  errorSchema,
);

export const jsonRpcPayloadSchema = Joi.alternatives().try(
  jsonRpcMessageSchema,
  Joi.array().items(jsonRpcMessageSchema).min(1),
);

export type ParsedPayload =
  | { ok: true; messages: JsonRpcMessage[]; batch: boolean }
  | { ok: false; reason: string };

/**
 * Validates a decoded POST body as a single JSON-RPC message or a batch.
 */
export function parseJsonRpcPayload(body: unknown): ParsedPayload {
  const { error, value } = jsonRpcPayloadSchema.validate(body, {
    abortEarly: true,
    convert: false,
  });
  if (error) {
    return { ok: false, reason: error.message };
  }
  const messages: JsonRpcMessage[] = Array.isArray(value) ? value : [value];
  return { ok: true, messages, batch: Array.isArray(value) };
}
