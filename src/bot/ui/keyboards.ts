import { InlineKeyboard, Keyboard } from "grammy";
import type { ConsultationRequest, PortfolioProject, TeamApplication } from "../../desk/types.js";
import type { ClientOrder, ReferralPayout } from "../../ledger/types.js";
import { BUTTONS, TEXTS } from "./texts.js";

export function mainKeyboard(): Keyboard {
  return new Keyboard()
    .text(BUTTONS.order)
    .row()
    .text(BUTTONS.portfolio)
    .text(BUTTONS.consultation)
    .row()
    .text(BUTTONS.team)
    .text(BUTTONS.referral)
    .row()
    .text(BUTTONS.help)
    .resized();
}

export function orderTypeInlineKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text("🤖 Telegram-бот", "order:type:bot")
    .row()
    .text("📱 Мини-приложение", "order:type:miniapp")
    .row()
    .text("⬅️ Отмена", "order:cancel");
}

export function orderConfirmInlineKeyboard(): InlineKeyboard {
  return new InlineKeyboard().text("✅ Отправить", "order:confirm").text("⬅️ Отмена", "order:cancel");
}

export function referralMenuInlineKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text("📊 Статистика", "ref:stats")
    .text("📜 Начисления", "ref:earnings")
    .row()
    .text("💳 Реквизиты", "ref:wallet")
    .text("💸 Вывести", "ref:payout");
}

export function payoutMethodInlineKeyboard(): InlineKeyboard {
  return new InlineKeyboard().text("💳 Карта", "ref:wallet:card").text("📱 СБП", "ref:wallet:sbp");
}

export function adminMenuInlineKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text("🆕 Новые заказы", "admin:orders:new")
    .row()
    .text("💬 Ожидают оплаты", "admin:orders:accepted")
    .row()
    .text("💰 Оплаченные", "admin:orders:paid")
    .row()
    .text("💸 Выплаты", "admin:payouts")
    .row()
    .text("👥 Заявки в команду", "admin:team")
    .row()
    .text("💬 Консультации", "admin:consultations")
    .row()
    .text("🗂 Портфолио", "admin:portfolio");
}

export function adminOrderInlineKeyboard(order: ClientOrder): InlineKeyboard {
  const kb = new InlineKeyboard();
  if (order.status === "new") {
    return kb
      .text("💵 Назначить цену", `admin:order:price:${order.id}`)
      .row()
      .text("❌ Отклонить", `admin:order:reject:${order.id}`)
      .text("🗑 Удалить", `admin:order:delete:${order.id}`);
  }
  if (order.status === "accepted") {
    return kb
      .text("✅ Оплата получена", `admin:order:paid:${order.id}`)
      .row()
      .text("✏️ Изменить цену", `admin:order:price:${order.id}`)
      .text("🗑 Удалить", `admin:order:delete:${order.id}`);
  }
  if (order.status === "paid") {
    return kb.text("🏁 Проект сдан", `admin:order:complete:${order.id}`);
  }
  return kb;
}

export function adminPayoutInlineKeyboard(payout: ReferralPayout): InlineKeyboard {
  const kb = new InlineKeyboard();
  if (payout.status === "requested") kb.text("✅ Одобрить", `admin:payout:approve:${payout.id}`);
  return kb
    .text("💸 Выплачено", `admin:payout:complete:${payout.id}`)
    .row()
    .text("❌ Отклонить", `admin:payout:reject:${payout.id}`);
}

/** Wraps around at both ends; the bot link opens the showcased bot. */
export function portfolioNavInlineKeyboard(index: number, total: number, project: PortfolioProject): InlineKeyboard {
  const kb = new InlineKeyboard();
  if (total > 1) {
    kb.text("⬅️", `portfolio:show:${(index - 1 + total) % total}`)
      .text(`${index + 1} / ${total}`, "portfolio:noop")
      .text("➡️", `portfolio:show:${(index + 1) % total}`);
  }
  if (project.botUrl) kb.row().url("🤖 Открыть бота", project.botUrl);
  return kb;
}

export function adminTeamInlineKeyboard(application: TeamApplication): InlineKeyboard {
  const kb = new InlineKeyboard();
  if (application.status === "new") {
    kb.text("✅ Принять", `admin:team:accept:${application.id}`)
      .text("❌ Отклонить", `admin:team:reject:${application.id}`)
      .row();
  }
  return kb.text("🗑 Удалить", `admin:team:delete:${application.id}`);
}

export function adminConsultationInlineKeyboard(request: ConsultationRequest): InlineKeyboard {
  return new InlineKeyboard()
    .text("✉️ Ответить", `admin:consult:answer:${request.id}`)
    .text("🏁 Завершить", `admin:consult:complete:${request.id}`);
}

export function adminPortfolioInlineKeyboard(project: PortfolioProject): InlineKeyboard {
  return new InlineKeyboard().text("🗑 Удалить", `admin:portfolio:delete:${project.id}`);
}

export function adminPortfolioMenuInlineKeyboard(): InlineKeyboard {
  return new InlineKeyboard().text(TEXTS.addProject, "admin:portfolio:add");
}
