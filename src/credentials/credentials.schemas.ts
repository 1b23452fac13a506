import Joi from 'joi';

export type AddKeyBody = {
  value: string;
  endpoint?: string;
};

export type RemoveKeyBody = {
  value: string;
};

export type ImportKeysBody = {
  values: string[];
  endpoint?: string;
};

const keyValue = Joi.string().trim().min(1).max(512);
const endpoint = Joi.string()
  .trim()
  .uri({ scheme: ['http', 'https'] });

export const addKeyBodySchema = Joi.object<AddKeyBody>({
  value: keyValue.required(),
  endpoint,
});

export const removeKeyBodySchema = Joi.object<RemoveKeyBody>({
  value: keyValue.required(),
});

export const importKeysBodySchema = Joi.object<ImportKeysBody>({
  values: Joi.array().items(keyValue.required()).min(1).max(1000).required(),
  endpoint,
});
