import { z } from 'zod';

/**
 * User-facing form messages. Tests and templates compare against these
 * exact strings.
 */
export const AuthMessages = {
  missingRequired: 'Please provide required values.',
  passwordsDiffer: 'Passwords do not match.',
  invalidEmail: 'Please provide a valid email.',
  usernameExists: 'User Name already exists.',
  emailExists: 'Email already registered.',
  missingLogin: 'Missing username and password.',
  missingUsername: 'Missing username.',
  missingPassword: 'Missing password.',
  loginFailed: 'Login failed.',
  missingAction: 'Please provide an action.',
  missingEmail: 'Please provide your email.',
  invalidAction: 'Please provide a valid action.',
  invalidResetToken: 'Please provide a valid reset token.',
  resetTokenExpired: 'Reset token expired. Please request again.',
  missingConfirmToken: 'Please provide a token.',
  invalidConfirmToken: 'Token is invalid. Request a new token below.',
  confirmTokenExpired: 'Token is expired. Request a new token below.',
  alreadyConfirmed: 'User already confirmed.',
} as const;

// Form values arrive as strings (or files); anything else counts as missing
const formField = z.preprocess((value) => (typeof value === 'string' ? value.trim() : ''), z.string());

const checkbox = z.preprocess((value) => value === 'on' || value === 'true' || value === '1', z.boolean());

const isEmail = (value: string) => z.string().email().safeParse(value).success;

function fail(ctx: z.RefinementCtx, message: string) {
  ctx.addIssue({ code: z.ZodIssueCode.custom, message });
}

// Registration: every field required, passwords must match
export const RegisterFormSchema = z
  .object({
    username: formField,
    fullName: formField,
    email: formField,
    password1: formField,
    password2: formField,
  })
  .superRefine((form, ctx) => {
    if (!form.username || !form.fullName || !form.email || !form.password1 || !form.password2) {
      fail(ctx, AuthMessages.missingRequired);
      return;
    }
    if (form.password1 !== form.password2) {
      fail(ctx, AuthMessages.passwordsDiffer);
      return;
    }
    if (!isEmail(form.email)) {
      fail(ctx, AuthMessages.invalidEmail);
    }
  });

export type RegisterForm = z.infer<typeof RegisterFormSchema>;

// Login: targeted message depending on which field is missing
export const LoginFormSchema = z
  .object({
    username: formField,
    password: formField,
    remember: checkbox,
  })
  .superRefine((form, ctx) => {
    if (!form.username && !form.password) {
      fail(ctx, AuthMessages.missingLogin);
    } else if (!form.username) {
      fail(ctx, AuthMessages.missingUsername);
    } else if (!form.password) {
      fail(ctx, AuthMessages.missingPassword);
    }
  });

export type LoginForm = z.infer<typeof LoginFormSchema>;

export const ForgotActionSchema = z.enum(['user', 'password']);

export type ForgotAction = z.infer<typeof ForgotActionSchema>;

/**
 * Build a schema for the email + action forms (forgot, confirm request).
 * Action is checked first, then email presence, then validity of both.
 */
function emailActionForm<T extends [string, ...string[]]>(actions: z.ZodEnum<T>) {
  return z
    .object({
      email: formField,
      action: formField,
    })
    .superRefine((form, ctx) => {
      if (!form.action) {
        fail(ctx, AuthMessages.missingAction);
      } else if (!form.email) {
        fail(ctx, AuthMessages.missingEmail);
      } else if (!actions.safeParse(form.action).success) {
        fail(ctx, AuthMessages.invalidAction);
      } else if (!isEmail(form.email)) {
        fail(ctx, AuthMessages.invalidEmail);
      }
    })
    .transform((form) => ({ email: form.email, action: actions.parse(form.action) }));
}

export const ForgotFormSchema = emailActionForm(ForgotActionSchema);

export type ForgotForm = z.infer<typeof ForgotFormSchema>;

export const ConfirmRequestActionSchema = z.enum(['confirm_request']);

export const ConfirmRequestFormSchema = emailActionForm(ConfirmRequestActionSchema);

export type ConfirmRequestForm = z.infer<typeof ConfirmRequestFormSchema>;

// Reset: token plus matching new passwords
export const ResetFormSchema = z
  .object({
    rtoken: formField,
    password1: formField,
    password2: formField,
  })
  .superRefine((form, ctx) => {
    if (!form.rtoken || !form.password1 || !form.password2) {
      fail(ctx, AuthMessages.missingRequired);
    } else if (form.password1 !== form.password2) {
      fail(ctx, AuthMessages.passwordsDiffer);
    }
  });

export type ResetForm = z.infer<typeof ResetFormSchema>;

export const ConfirmFormSchema = z
  .object({
    ctoken: formField,
  })
  .superRefine((form, ctx) => {
    if (!form.ctoken) {
      fail(ctx, AuthMessages.missingConfirmToken);
    }
  });

export type ConfirmForm = z.infer<typeof ConfirmFormSchema>;

/**
 * First issue message of a failed form parse; forms show one message at a time.
 */
export function firstIssueMessage(error: z.ZodError): string {
  return error.issues[0]?.message ?? AuthMessages.missingRequired;
}
