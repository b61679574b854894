import type { AuctionRouter } from "./context.ts";

import { redirect } from "@/common/index.ts";
import {
  endSession,
  getCurrentUser,
  hashPassword,
  startSession,
  verifyPassword,
} from "@/auth/index.ts";
import { emailExists, findUserByEmail, insertUser } from "@/db/dal.ts";
import {
  composeValidators,
  createEmailAvailabilityValidator,
  EMAIL_TAKEN_MESSAGE,
  forbidden,
  isValid,
  readFields,
  renderPage,
  validateEmail,
  validateForm,
} from "@/web/index.ts";
import { pageData } from "./context.ts";

const SIGN_UP_FIELDS = ["email", "password", "name", "message"] as const;
const LOGIN_FIELDS = ["email", "password"] as const;

export function registerAuthRoutes(router: AuctionRouter) {
  // Registration page
  router.get(`/sign-up`, async (request, env) => {
    if (getCurrentUser(request, env)) throw forbidden();
    return renderPage(
      env,
      "sign-up",
      { errors: {}, values: {} },
      pageData(env, null, "Регистрация")
    );
  });

  router.post(`/sign-up`, async (request, env) => {
    if (getCurrentUser(request, env)) throw forbidden();
    const fields = readFields(await request.formData(), SIGN_UP_FIELDS);
    const errors = validateForm(
      fields,
      {
        email: composeValidators(
          validateEmail,
          createEmailAvailabilityValidator((email) => emailExists(env.db, email))
        ),
      },
      SIGN_UP_FIELDS
    );

    if (isValid(errors)) {
      const id = insertUser(env.db, {
        email: fields.email,
        name: fields.name.trim(),
        contacts: fields.message.trim(),
        passwordHash: await hashPassword(fields.password),
        createdAt: env.clock(),
      });
      if (id !== undefined) {
        env.logger.info("user:registered", { userId: id });
        return redirect("/login");
      }
      // Another sign-up took the address while the password was hashing
      errors.email = EMAIL_TAKEN_MESSAGE;
    }

    // Re-display with entered values; the password is never echoed back
    const { password: _password, ...values } = fields;
    return renderPage(env, "sign-up", { errors, values }, pageData(env, null, "Регистрация"));
  });

  // Login page
  router.get(`/login`, async (request, env) => {
    if (getCurrentUser(request, env)) throw forbidden();
    return renderPage(env, "login", { errors: {}, values: {} }, pageData(env, null, "Вход"));
  });

  router.post(`/login`, async (request, env) => {
    if (getCurrentUser(request, env)) throw forbidden();
    const fields = readFields(await request.formData(), LOGIN_FIELDS);
    const errors = validateForm(fields, { email: validateEmail }, LOGIN_FIELDS);

    if (isValid(errors)) {
      const user = findUserByEmail(env.db, fields.email);
      if (!user) {
        errors.email = "Такой пользователь не найден";
      } else if (!(await verifyPassword(fields.password, user.passwordHash))) {
        errors.password = "Вы ввели неверный пароль";
        env.logger.info("login:rejected", { userId: user.id });
      } else {
        env.logger.info("login:ok", { userId: user.id });
        return redirect("/", startSession(env, user.id));
      }
    }

    return renderPage(
      env,
      "login",
      { errors, values: { email: fields.email } },
      pageData(env, null, "Вход")
    );
  });

  router.get(`/logout`, (request, env) => {
    return redirect("/", endSession(request, env));
  });
}
