import { formatMoney } from "../../core/money.js";
import type {
  ConsultationRequest,
  ConsultationStatus,
  PortfolioProject,
  TeamApplication,
  TeamApplicationStatus
} from "../../desk/types.js";
import type {
  ClientOrder,
  EarningStatus,
  OrderStatus,
  OrderType,
  PayoutStatus,
  ReferralEarning,
  ReferralPayout,
  ReferralStats
} from "../../ledger/types.js";
import type { OrderDraft } from "../state.js";

export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/** dd.mm.yyyy in UTC. */
export function formatDate(d: Date): string {
  const dd = String(d.getUTCDate()).padStart(2, "0");
  const mm = String(d.getUTCMonth() + 1).padStart(2, "0");
  return `${dd}.${mm}.${d.getUTCFullYear()}`;
}

export const ORDER_TYPE_LABELS: Record<OrderType, string> = {
  bot: "Telegram-бот",
  miniapp: "Мини-приложение"
};

export const ORDER_STATUS_LABELS: Record<OrderStatus, string> = {
  new: "🆕 Новый",
  accepted: "💬 Ожидает оплаты",
  rejected: "❌ Отклонён",
  paid: "💰 Оплачен",
  completed: "✅ Завершён"
};

export const EARNING_STATUS_ICONS: Record<EarningStatus, string> = {
  pending: "⏳",
  confirmed: "✅",
  paid: "💸"
};

export const PAYOUT_STATUS_LABELS: Record<PayoutStatus, string> = {
  requested: "⏳ Запрошена",
  processing: "🔄 В обработке",
  completed: "✅ Выплачена",
  failed: "❌ Отклонена"
};

export const TEAM_STATUS_LABELS: Record<TeamApplicationStatus, string> = {
  new: "🆕 Новая",
  accepted: "✅ Принята",
  rejected: "❌ Отклонена"
};

export const CONSULTATION_STATUS_LABELS: Record<ConsultationStatus, string> = {
  new: "🆕 Новый",
  answered: "✉️ Отвечен",
  completed: "🏁 Завершён"
};

export function formatOrderDraft(draft: OrderDraft): string {
  return [
    "<b>Проверьте заявку:</b>",
    "",
    `Тип: ${draft.orderType ? ORDER_TYPE_LABELS[draft.orderType] : "—"}`,
    `Проект: ${escapeHtml(draft.projectName ?? "—")}`,
    `Функциональность: ${escapeHtml(draft.functionality ?? "—")}`,
    `Сроки: ${escapeHtml(draft.deadlines ?? "—")}`,
    `Бюджет: ${escapeHtml(draft.budget ?? "—")}`
  ].join("\n");
}

export function formatOrderCard(order: ClientOrder): string {
  const lines = [
    `<b>Заказ #${order.id}</b> — ${ORDER_STATUS_LABELS[order.status]}`,
    `Клиент: ${order.username ? `@${escapeHtml(order.username)}` : "—"} (${order.userId})`,
    `Тип: ${ORDER_TYPE_LABELS[order.orderType]}`,
    `Проект: ${escapeHtml(order.projectName)}`,
    `Функциональность: ${escapeHtml(order.functionality)}`,
    `Сроки: ${escapeHtml(order.deadlines)}`,
    `Бюджет: ${escapeHtml(order.budget)}`
  ];
  if (order.finalPrice !== null) lines.push(`Итоговая цена: ${formatMoney(order.finalPrice)}`);
  if (order.adminNotes) lines.push(`Заметки: ${escapeHtml(order.adminNotes)}`);
  return lines.join("\n");
}

export function formatStats(stats: ReferralStats, link: string): string {
  return [
    "📊 <b>Ваша статистика</b>",
    "",
    `Приведено пользователей: ${stats.totalReferrals}`,
    `Всего заработано: ${formatMoney(stats.totalEarned)}`,
    `Доступно к выводу: ${formatMoney(stats.balance)}`,
    `Выплачено: ${formatMoney(stats.totalPaid)}`,
    "",
    `Ваш код: <code>${stats.referralCode}</code>`,
    `Ссылка: ${link}`
  ].join("\n");
}

export function formatEarnings(earnings: ReferralEarning[], shown = 10): string {
  const lines = ["📜 <b>История начислений</b>", ""];
  for (const e of earnings.slice(0, shown)) {
    lines.push(
      `${EARNING_STATUS_ICONS[e.status]} <b>${formatMoney(e.earnedAmount)}</b> (${formatDate(e.createdAt)})`,
      `   Заказ #${e.orderId} — ${formatMoney(e.orderAmount)}`
    );
  }
  if (earnings.length > shown) lines.push("", `<i>… и ещё ${earnings.length - shown}</i>`);
  lines.push("", "⏳ ожидает · ✅ начислено · 💸 выплачено");
  return lines.join("\n");
}

export function formatPayoutCard(payout: ReferralPayout): string {
  const lines = [
    `<b>Выплата #${payout.id}</b> — ${PAYOUT_STATUS_LABELS[payout.status]}`,
    `Партнёр: ${payout.referrerId}`,
    `Сумма: ${formatMoney(payout.amount)}`,
    `Метод: ${payout.method}`,
    `Реквизиты: ${escapeHtml(payout.recipientInfo ?? "—")}`
  ];
  if (payout.adminNotes) lines.push(`Заметки: ${escapeHtml(payout.adminNotes)}`);
  return lines.join("\n");
}

function who(username: string | null, userId: number): string {
  return `${username ? `@${escapeHtml(username)}` : "—"} (${userId})`;
}

export function formatTeamApplicationCard(application: TeamApplication): string {
  return [
    `<b>Заявка в команду #${application.id}</b> — ${TEAM_STATUS_LABELS[application.status]}`,
    `Пользователь: ${who(application.username, application.userId)}`,
    `Имя: ${escapeHtml(application.fullName)}`,
    `Возраст: ${escapeHtml(application.age)}`,
    `Опыт: ${escapeHtml(application.experience)}`,
    `Стек: ${escapeHtml(application.stack)}`,
    `О себе: ${escapeHtml(application.about)}`,
    `Мотивация: ${escapeHtml(application.motivation)}`,
    `Роль: ${escapeHtml(application.role)}`
  ].join("\n");
}

export function formatConsultationCard(request: ConsultationRequest): string {
  const lines = [
    `<b>Консультация #${request.id}</b> — ${CONSULTATION_STATUS_LABELS[request.status]}`,
    `Пользователь: ${who(request.username, request.userId)}`,
    `Вопрос: ${escapeHtml(request.question)}`
  ];
  if (request.answer) lines.push(`Ответ: ${escapeHtml(request.answer)}`);
  return lines.join("\n");
}

/** `position` is shown to clients browsing the portfolio. */
export function formatPortfolioCard(project: PortfolioProject, position?: { index: number; total: number }): string {
  const lines = [`📌 <b>${escapeHtml(project.title)}</b>`, "", `📝 <i>${escapeHtml(project.description)}</i>`];
  if (project.details) lines.push("", escapeHtml(project.details));
  if (project.technologies) lines.push(`🛠 Технологии: ${escapeHtml(project.technologies)}`);
  if (project.duration) lines.push(`⏱️ Срок разработки: ${escapeHtml(project.duration)}`);
  lines.push(`💰 Стоимость: ${escapeHtml(project.cost)}`);
  if (project.videoUrl) lines.push(`🎬 <a href="${escapeHtml(project.videoUrl).replace(/"/g, "&quot;")}">Видео</a>`);
  if (position) lines.push("", `Проект ${position.index + 1} из ${position.total}`);
  return lines.join("\n");
}
