import type { AppEnv } from "@/env.ts";

import { readdirSync } from "node:fs";
import { beforeEach, describe, it, expect } from "vitest";
import { sql } from "drizzle-orm";
import { createRouter } from "@/index.ts";
import { emailExists, getLot } from "@/db/dal.ts";
import { users } from "@/db/schema.ts";
import { cookiePair, createTestEnv, formBody, seedUser } from "./util/test-helpers.ts";

const router = createRouter();
let env: AppEnv;

function get(path: string, cookie?: string): Promise<Response> {
  const headers: Record<string, string> = cookie ? { Cookie: cookie } : {};
  return router.fetch(new Request(`http://localhost${path}`, { headers }), env);
}

function post(path: string, body: URLSearchParams | FormData, cookie?: string): Promise<Response> {
  const headers: Record<string, string> = cookie ? { Cookie: cookie } : {};
  return router.fetch(
    new Request(`http://localhost${path}`, { method: "POST", body, headers }),
    env
  );
}

async function signIn(email: string, password: string): Promise<string> {
  const res = await post("/login", formBody({ email, password }));
  expect(res.status).toBe(302);
  return cookiePair(res.headers.get("Set-Cookie"));
}

function lotForm(values: Record<string, string>, image?: { name: string; bytes: number[] }) {
  const form = new FormData();
  for (const [k, v] of Object.entries(values)) form.append(k, v);
  if (image) {
    form.append("lot-img", new Blob([new Uint8Array(image.bytes)], { type: "image/png" }), image.name);
  }
  return form;
}

const VALID_LOT = {
  "lot-name": "Сноуборд",
  category: "1",
  message: "Почти новый",
  "lot-rate": "10999.5",
  "lot-step": "500",
  "lot-date": "2024-01-20",
};
const PNG = { name: "board.png", bytes: [137, 80, 78, 71] };

beforeEach(() => {
  env = createTestEnv();
});

describe("pages", () => {
  it("renders the home page for guests", async () => {
    const res = await get("/");
    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toBe("text/html; charset=utf-8");
    const html = await res.text();
    expect(html).toContain("<title>Главная</title>");
    expect(html).toContain('<p class="lots__empty">Пока нет открытых лотов</p>');
    expect(html).toContain('<li class="user-menu__item"><a href="/login">Вход</a></li>');
  });

  it("answers 404 for unknown paths and lots", async () => {
    const missing = await get("/nope");
    expect(missing.status).toBe(404);
    expect(await missing.text()).toContain('<p class="error__message">Страница не найдена</p>');

    for (const path of ["/lot/999", "/lot/abc"]) {
      const res = await get(path);
      expect(res.status).toBe(404);
      expect(await res.text()).toContain('<p class="error__message">Лот не найден</p>');
    }
    expect((await get("/?category=missing")).status).toBe(404);
  });

  it("serves the stylesheet", async () => {
    const res = await get("/base.css");
    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toBe("text/css; charset=utf-8");
  });
});

describe("sign-up", () => {
  it("re-displays the form with errors and entered values", async () => {
    const res = await post(
      "/sign-up",
      formBody({ email: "", password: "x", name: "Ира", message: "telegram" })
    );
    expect(res.status).toBe(200);
    const html = await res.text();
    expect(html).toContain('<span class="form__error">Заполните это поле</span>');
    expect(html).toContain('value="Ира"');
    expect(html).toContain(">telegram</textarea>");
  });

  it("reports an email that is already registered", async () => {
    await seedUser(env, "ira@example.com", "Ира", "test-password");
    const res = await post(
      "/sign-up",
      formBody({ email: "IRA@example.com", password: "x", name: "Ира", message: "tg" })
    );
    expect(await res.text()).toContain(
      '<span class="form__error">Пользователь с этим email уже зарегистрирован</span>'
    );
  });

  it("creates the account and redirects to login", async () => {
    const res = await post(
      "/sign-up",
      formBody({ email: "new@example.com", password: "test-password", name: "Новый", message: "tg" })
    );
    expect(res.status).toBe(302);
    expect(res.headers.get("Location")).toBe("/login");
    expect(emailExists(env.db, "new@example.com")).toBe(true);

    const cookie = await signIn("new@example.com", "test-password");
    expect(cookie.startsWith("sid=")).toBe(true);
  });

  it("keeps a single account when one address signs up twice at once", async () => {
    const send = (email: string) =>
      post("/sign-up", formBody({ email, password: "test-password", name: "Ира", message: "tg" }));

    for (const [first, second] of [
      ["dup@example.com", "DUP@example.com"],
      ["same@example.com", "same@example.com"],
    ]) {
      const responses = await Promise.all([send(first), send(second)]);
      expect(responses.map((r) => r.status).sort()).toEqual([200, 302]);
      const rejected = responses.find((r) => r.status === 200);
      expect(await rejected?.text()).toContain(
        '<span class="form__error">Пользователь с этим email уже зарегистрирован</span>'
      );
    }

    const emails = env.db.select({ email: users.email }).from(users).all().map((u) => u.email);
    expect(emails).toEqual(["dup@example.com", "same@example.com"]);
  });
});

describe("login", () => {
  beforeEach(async () => {
    await seedUser(env, "ira@example.com", "Ира", "test-password");
  });

  it("requires both fields", async () => {
    const html = await (await post("/login", formBody({ email: "", password: "" }))).text();
    expect(html.split('<span class="form__error">Заполните это поле</span>')).toHaveLength(3);
  });

  it("rejects unknown users and wrong passwords", async () => {
    const unknown = await (
      await post("/login", formBody({ email: "ghost@example.com", password: "x" }))
    ).text();
    expect(unknown).toContain('<span class="form__error">Такой пользователь не найден</span>');
    expect(unknown).toContain('value="ghost@example.com"');

    const wrong = await (
      await post("/login", formBody({ email: "ira@example.com", password: "nope" }))
    ).text();
    expect(wrong).toContain('<span class="form__error">Вы ввели неверный пароль</span>');
  });

  it("starts a session and shows the user", async () => {
    const res = await post("/login", formBody({ email: "ira@example.com", password: "test-password" }));
    expect(res.status).toBe(302);
    expect(res.headers.get("Location")).toBe("/");
    const setCookie = res.headers.get("Set-Cookie") ?? "";
    expect(setCookie).toContain("HttpOnly");
    expect(setCookie).toContain("SameSite=Lax");

    const cookie = cookiePair(setCookie);
    const home = await (await get("/", cookie)).text();
    expect(home).toContain('<p class="user-menu__name">Ира</p>');

    expect((await get("/login", cookie)).status).toBe(403);
    expect((await get("/sign-up", cookie)).status).toBe(403);
  });

  it("logs out", async () => {
    const cookie = await signIn("ira@example.com", "test-password");
    const res = await get("/logout", cookie);
    expect(res.status).toBe(302);
    expect(res.headers.get("Set-Cookie")).toBe("sid=; Path=/; Max-Age=0; HttpOnly; SameSite=Lax");

    const home = await (await get("/", cookie)).text();
    expect(home).not.toContain("user-menu__name");
  });
});

describe("lots", () => {
  let authorCookie: string;
  let bidderId: number;

  beforeEach(async () => {
    await seedUser(env, "author@example.com", "Автор", "test-password");
    bidderId = await seedUser(env, "bidder@example.com", "Покупатель", "test-password");
    authorCookie = await signIn("author@example.com", "test-password");
  });

  it("requires a session to add a lot", async () => {
    expect((await get("/add")).status).toBe(403);
    expect((await post("/add", lotForm(VALID_LOT, PNG))).status).toBe(403);
  });

  it("shows validation errors for a bad lot", async () => {
    const res = await post("/add", lotForm({ "lot-rate": "-1", "lot-date": "2024-01-10" }), authorCookie);
    expect(res.status).toBe(200);
    const html = await res.text();
    expect(html).toContain('<span class="form__error">Значение должно быть числом больше 0</span>');
    expect(html).toContain(
      '<span class="form__error">Дата должна быть больше текущей даты хотя бы на 1 день.</span>'
    );
    expect(html).toContain(
      '<span class="form__error">Загрузите картинку в формате JPG, JPEG или PNG</span>'
    );
    expect(html).toContain('value="-1"');
    expect(readdirSync(env.config.uploadsDir)).toEqual([]);
  });

  it("rejects images with other extensions", async () => {
    const res = await post("/add", lotForm(VALID_LOT, { name: "board.gif", bytes: [1] }), authorCookie);
    const html = await res.text();
    expect(html).toContain(
      '<span class="form__error">Загрузите картинку в формате JPG, JPEG или PNG</span>'
    );
    expect(html).toContain('<option value="1" selected>Доски и лыжи</option>');
  });

  it("creates a lot, stores the image and accepts bets", async () => {
    const created = await post("/add", lotForm(VALID_LOT, PNG), authorCookie);
    expect(created.status).toBe(302);
    expect(created.headers.get("Location")).toBe("/lot/1");

    const files = readdirSync(env.config.uploadsDir);
    expect(files).toHaveLength(1);
    expect(files[0].endsWith(".png")).toBe(true);
    const image = await get(`/uploads/${files[0]}`);
    expect(image.headers.get("Content-Type")).toBe("image/png");
    expect(Array.from(new Uint8Array(await image.arrayBuffer()))).toEqual(PNG.bytes);

    // The author sees the lot but cannot bid on it
    const authorView = await (await get("/lot/1", authorCookie)).text();
    expect(authorView).toContain("<h2>Сноуборд</h2>");
    expect(authorView).toContain('<span class="lot-item__cost">11 000 ₽</span>');
    expect(authorView).toContain("Мин. ставка <span>11 500 ₽</span>");
    expect(authorView).toContain('<div class="lot-item__timer timer">228:00</div>');
    expect(authorView).not.toContain('name="cost"');
    expect((await post("/lot/1", formBody({ cost: "20000" }), authorCookie)).status).toBe(403);

    const bidder = await signIn("bidder@example.com", "test-password");
    const low = await (await post("/lot/1", formBody({ cost: "11000" }), bidder)).text();
    expect(low).toContain('<span class="form__error">Ставка должна быть не меньше 11500</span>');
    expect(low).toContain('value="11000"');

    const bet = await post("/lot/1", formBody({ cost: "11500" }), bidder);
    expect(bet.status).toBe(302);
    expect(bet.headers.get("Location")).toBe("/lot/1");

    const lotPage = await (await get("/lot/1", bidder)).text();
    expect(lotPage).toContain("История ставок (<span>1</span>)");
    expect(lotPage).toContain('<td class="history__price">11 500 ₽</td>');
    expect(lotPage).toContain('<td class="history__time">0 секунд назад</td>');
    expect(lotPage).toContain('placeholder="12000"');

    const home = await (await get("/")).text();
    expect(home).toContain('<span class="lot__amount">1 ставка</span>');
    expect(home).toContain('<span class="lot__cost">11 500 ₽</span>');

    const category = await (await get("/?category=boards")).text();
    expect(category).toContain("Все лоты в категории «Доски и лыжи»");
    expect(category).toContain('<a class="text-link" href="/lot/1">Сноуборд</a>');
  });

  it("rejects images over the size limit", async () => {
    env = { ...env, config: { ...env.config, maxUploadBytes: 3 } };
    const html = await (await post("/add", lotForm(VALID_LOT, PNG), authorCookie)).text();
    expect(html).toContain('<span class="form__error">Картинка слишком большая</span>');
    expect(readdirSync(env.config.uploadsDir)).toEqual([]);
  });

  it("removes the stored image when the lot cannot be saved", async () => {
    env.db.run(sql`CREATE TRIGGER reject_lots BEFORE INSERT ON lots BEGIN SELECT RAISE(ABORT, 'no lots'); END`);
    const res = await post("/add", lotForm(VALID_LOT, PNG), authorCookie);
    expect(res.status).toBe(500);
    expect(readdirSync(env.config.uploadsDir)).toEqual([]);
  });

  it("names the top bidder as winner once the lot closes", async () => {
    await post("/add", lotForm(VALID_LOT, PNG), authorCookie);
    const bidder = await signIn("bidder@example.com", "test-password");
    expect((await post("/lot/1", formBody({ cost: "11500" }), bidder)).status).toBe(302);

    env = { ...env, clock: () => new Date(2024, 0, 20, 9, 0, 0) };
    const lateBidder = await signIn("bidder@example.com", "test-password");
    const page = await (await get("/lot/1", lateBidder)).text();
    expect(page).toContain('<p class="lot-item__closed">Торги окончены</p>');
    expect(page).toContain('<p class="lot-item__winner">Ваша ставка выиграла</p>');
    expect(page).not.toContain('name="cost"');
    expect(getLot(env.db, 1)?.winnerId).toBe(bidderId);

    const lateAuthor = await signIn("author@example.com", "test-password");
    const authorPage = await (await get("/lot/1", lateAuthor)).text();
    expect(authorPage).toContain('<p class="lot-item__closed">Торги окончены</p>');
    expect(authorPage).not.toContain("lot-item__winner");
  });

  it("rejects bets from guests", async () => {
    await post("/add", lotForm(VALID_LOT, PNG), authorCookie);
    expect((await post("/lot/1", formBody({ cost: "11500" }))).status).toBe(403);
  });
});
