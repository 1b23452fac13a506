import Joi from 'joi';

export type AccountBody = {
  username: string;
  password: string;
};

// bcrypt only reads the first 72 bytes of a password.
const PASSWORD_MAX_BYTES = 72;

export const accountBodySchema = Joi.object<AccountBody>({
  username: Joi.string().trim().min(1).max(64).required(),
  password: Joi.string()
    .min(1)
    .required()
    .custom((value: string, helpers) => {
      if (Buffer.byteLength(value, 'utf8') > PASSWORD_MAX_BYTES) {
        return helpers.error('any.custom');
      }
      return value;
    }, 'Password byte length validation')
    .messages({
      'any.custom': `{{#label}} must be at most ${PASSWORD_MAX_BYTES} bytes`,
    }),
});
