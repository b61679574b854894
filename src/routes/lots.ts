import type { AppEnv } from "@/env.ts";
import type { AuctionRouter } from "./context.ts";
import type { SessionUser } from "@/auth/session.ts";
import type { LotCard, LotDetail } from "@/db/dal.ts";

import { randomUUID } from "node:crypto";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { redirect } from "@/common/index.ts";
import { getCurrentUser } from "@/auth/index.ts";
import {
  assignWinners,
  findCategoryByCode,
  getLot,
  insertBet,
  insertLot,
  listBets,
  listCategories,
  listOpenLots,
} from "@/db/dal.ts";
import {
  forbidden,
  getExtension,
  isValid,
  notFound,
  readFields,
  relativeTime,
  remainingTime,
  renderPage,
  toDateString,
  validateBidAmount,
  validateBidStep,
  validateCategoryId,
  validateEndDate,
  validateForm,
  validateImageName,
  validateImageSize,
  validatePrice,
  type FieldValues,
  type FormErrors,
} from "@/web/index.ts";
import { pageData, parseId } from "./context.ts";

const LOT_FIELDS = ["lot-name", "category", "message", "lot-rate", "lot-step", "lot-date"] as const;
const BET_FIELDS = ["cost"] as const;

function withTimer<T extends LotCard>(lot: T, now: Date) {
  const remaining = remainingTime(lot.finishAt, now);
  return { ...lot, remaining, finishing: Number(remaining[0]) < 1 };
}

function isOpen(lot: LotDetail, now: Date): boolean {
  return lot.finishAt > toDateString(now);
}

/** Smallest acceptable next bet: current price rounded up plus the bid step. */
export function minimumBid(lot: LotDetail): number {
  return Math.ceil(lot.currentPrice) + lot.bidStep;
}

function canBid(lot: LotDetail, user: SessionUser | null, now: Date): boolean {
  return user !== null && user.id !== lot.authorId && isOpen(lot, now);
}

async function showLot(
  env: AppEnv,
  lot: LotDetail,
  user: SessionUser | null,
  form: { errors: FormErrors; values: FieldValues }
): Promise<Response> {
  const now = env.clock();
  const bets = listBets(env.db, lot.id).map((bet) => ({
    ...bet,
    ago: relativeTime(bet.createdAt, now),
  }));
  return renderPage(
    env,
    "lot",
    {
      lot: withTimer(lot, now),
      bets,
      minBid: minimumBid(lot),
      canBid: canBid(lot, user, now),
      closed: !isOpen(lot, now),
      won: user !== null && lot.winnerId === user.id,
      ...form,
    },
    pageData(env, user, lot.title)
  );
}

/** Give lots that have just closed their winner. */
function settleLots(env: AppEnv, now: Date): void {
  const assigned = assignWinners(env.db, toDateString(now));
  if (assigned > 0) env.logger.info("lots:settled", { count: assigned });
}

function requireLot(env: AppEnv, raw: string | undefined): LotDetail {
  const id = parseId(raw);
  const lot = id === null ? undefined : getLot(env.db, id);
  if (!lot) throw notFound("Лот не найден");
  return lot;
}

export function registerLotRoutes(router: AuctionRouter) {
  // Home: newest open lots, optionally ?category=<code>
  router.get(`/`, async (request, env) => {
    const now = env.clock();
    const user = getCurrentUser(request, env);
    settleLots(env, now);
    const code = request.query.category;
    const category = typeof code === "string" ? findCategoryByCode(env.db, code) : undefined;
    if (typeof code === "string" && !category) throw notFound("Категория не найдена");

    const lots = listOpenLots(
      env.db,
      toDateString(now),
      env.config.lotsPerPage,
      category?.id
    ).map((lot) => withTimer(lot, now));
    const title = category?.title ?? "Главная";
    return renderPage(env, "main", { lots, category }, pageData(env, user, title));
  });

  router.get(`/lot/:id`, async (request, env) => {
    settleLots(env, env.clock());
    const lot = requireLot(env, request.params.id);
    const user = getCurrentUser(request, env);
    return showLot(env, lot, user, { errors: {}, values: {} });
  });

  // Place a bet
  router.post(`/lot/:id`, async (request, env) => {
    const user = getCurrentUser(request, env);
    if (!user) throw forbidden();
    const lot = requireLot(env, request.params.id);
    const now = env.clock();
    if (!canBid(lot, user, now)) throw forbidden("Ставки на этот лот не принимаются");

    const min = minimumBid(lot);
    const fields = readFields(await request.formData(), BET_FIELDS);
    const errors = validateForm(
      fields,
      { cost: (value) => validateBidAmount(value, min) },
      BET_FIELDS
    );
    if (!isValid(errors)) {
      return showLot(env, lot, user, { errors, values: fields });
    }

    const amount = Number(fields.cost.trim());
    insertBet(env.db, { lotId: lot.id, userId: user.id, amount, createdAt: now });
    env.logger.info("bet:placed", { lotId: lot.id, userId: user.id, amount });
    return redirect(`/lot/${lot.id}`);
  });

  // Add a lot
  router.get(`/add`, async (request, env) => {
    const user = getCurrentUser(request, env);
    if (!user) throw forbidden();
    const page = pageData(env, user, "Добавление лота");
    return renderPage(env, "add-lot", { errors: {}, values: {}, categories: page.categories }, page);
  });

  router.post(`/add`, async (request, env) => {
    const user = getCurrentUser(request, env);
    if (!user) throw forbidden();
    const now = env.clock();
    const form = await request.formData();
    const fields = readFields(form, LOT_FIELDS);
    const categories = listCategories(env.db);
    const categoryIds = new Set(categories.map((c) => String(c.id)));

    const errors = validateForm(
      fields,
      {
        category: (value) => validateCategoryId(value, categoryIds),
        "lot-rate": validatePrice,
        "lot-step": validateBidStep,
        "lot-date": (value) => validateEndDate(value, now),
      },
      LOT_FIELDS
    );
    const upload = form.get("lot-img");
    const file = upload !== null && typeof upload !== "string" && upload.size > 0 ? upload : null;
    const imageError =
      validateImageName(file?.name ?? "") ?? validateImageSize(file?.size ?? 0, env.config.maxUploadBytes);
    if (imageError) errors["lot-img"] = imageError;

    if (!isValid(errors) || !file) {
      return renderPage(
        env,
        "add-lot",
        { errors, values: fields, categories },
        pageData(env, user, "Добавление лота")
      );
    }

    const fileName = `${randomUUID()}.${getExtension(file.name)}`;
    const filePath = join(env.config.uploadsDir, fileName);
    await mkdir(env.config.uploadsDir, { recursive: true });
    await writeFile(filePath, new Uint8Array(await file.arrayBuffer()));

    let id: number;
    try {
      id = insertLot(env.db, {
        title: fields["lot-name"].trim(),
        description: fields.message.trim(),
        image: `/uploads/${fileName}`,
        startPrice: Number(fields["lot-rate"].trim()),
        bidStep: Number(fields["lot-step"].trim()),
        finishAt: fields["lot-date"].trim(),
        createdAt: now,
        authorId: user.id,
        categoryId: Number(fields.category.trim()),
      });
    } catch (e) {
      // No lot points at the image; drop it
      await rm(filePath, { force: true });
      throw e;
    }
    env.logger.info("lot:created", { lotId: id, userId: user.id });
    return redirect(`/lot/${id}`);
  });
}
