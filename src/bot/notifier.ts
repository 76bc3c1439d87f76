import { notifyAdmins } from "../core/adminAlerts.js";
import type { MessageSender } from "../core/adminAlerts.js";
import { logger } from "../core/logger.js";
import { formatMoney } from "../core/money.js";
import type { DeskEvent, DeskEventSink } from "../desk/events.js";
import type { LedgerEvent, LedgerEventSink } from "../ledger/events.js";
import {
  escapeHtml,
  formatConsultationCard,
  formatOrderCard,
  formatPayoutCard,
  formatTeamApplicationCard
} from "./ui/format.js";

export type OutboundMessage =
  | { to: "user"; chatId: number; text: string }
  | { to: "admins"; text: string };

const log = logger.child("notifier");

export type BotEvent = LedgerEvent | DeskEvent;

/** What each event tells whom. Pure, so the wording is testable. */
export function renderEvent(event: BotEvent): OutboundMessage[] {
  switch (event.type) {
    case "order.created":
      return [{ to: "admins", text: `📝 <b>Новая заявка</b>\n\n${formatOrderCard(event.order)}` }];

    case "order.accepted": {
      const { order } = event;
      const price = order.finalPrice === null ? "—" : formatMoney(order.finalPrice);
      const notes = order.adminNotes ? `\n📝 ${escapeHtml(order.adminNotes)}` : "";
      const head = event.repriced ? "✏️ <b>Стоимость заказа изменена</b>" : "✅ <b>Ваш заказ принят!</b>";
      return [
        {
          to: "user",
          chatId: order.userId,
          text: `${head}\n\nЗаказ #${order.id}: ${escapeHtml(order.projectName)}\n💰 Стоимость: ${price}${notes}`
        }
      ];
    }

    case "order.rejected": {
      const reason = event.reason ? `\nПричина: ${escapeHtml(event.reason)}` : "";
      return [
        {
          to: "user",
          chatId: event.order.userId,
          text: `❌ Заказ #${event.order.id} отклонён.${reason}`
        }
      ];
    }

    case "order.paid": {
      const messages: OutboundMessage[] = [
        {
          to: "user",
          chatId: event.order.userId,
          text: `💰 Оплата заказа #${event.order.id} подтверждена. Приступаем к работе!`
        }
      ];
      if (event.earning) {
        messages.push({
          to: "user",
          chatId: event.earning.referrerId,
          text:
            "🎉 <b>Новое начисление!</b>\n\n" +
            `Ваш реферал оплатил заказ на ${formatMoney(event.earning.orderAmount)}.\n` +
            `Вам начислено: <b>${formatMoney(event.earning.earnedAmount)}</b>`
        });
      }
      return messages;
    }

    case "order.completed":
      return [{ to: "user", chatId: event.order.userId, text: `🏁 Проект по заказу #${event.order.id} сдан. Спасибо!` }];

    case "referral.linked":
      return [
        {
          to: "user",
          chatId: event.referrer.userId,
          text: `🤝 По вашей ссылке пришёл новый пользователь. Всего рефералов: ${event.referrer.totalReferrals}`
        }
      ];

    case "payout.requested": {
      const who = event.referrer.username ? `@${escapeHtml(event.referrer.username)}` : String(event.referrer.userId);
      return [
        { to: "admins", text: `💸 <b>Новый запрос на выплату</b> от ${who}\n\n${formatPayoutCard(event.payout)}` }
      ];
    }

    case "payout.approved":
      return [
        {
          to: "user",
          chatId: event.payout.referrerId,
          text:
            `✅ <b>Выплата одобрена!</b>\n\n💰 Сумма: ${formatMoney(event.payout.amount)}\n` +
            "⏳ Выплата будет произведена в течение 1-3 рабочих дней."
        }
      ];

    case "payout.rejected":
      return [
        {
          to: "user",
          chatId: event.payout.referrerId,
          text:
            `❌ <b>Выплата отклонена</b>\n\n💰 Сумма: ${formatMoney(event.payout.amount)} возвращена на баланс.\n` +
            `📝 Причина: ${escapeHtml(event.reason)}`
        }
      ];

    case "payout.completed":
      return [
        {
          to: "user",
          chatId: event.payout.referrerId,
          text: `✅ <b>Выплата завершена!</b>\n\n💰 ${formatMoney(event.payout.amount)} переведены на ваши реквизиты.`
        }
      ];

    case "team.applied":
      return [
        { to: "admins", text: `👥 <b>Новая заявка в команду</b>\n\n${formatTeamApplicationCard(event.application)}` }
      ];

    case "team.decided": {
      const { application } = event;
      const text =
        application.status === "accepted"
          ? "🎉 <b>Ваша заявка в команду одобрена!</b>\n\nМы свяжемся с вами в ближайшее время."
          : "Спасибо за интерес к нашей команде! Сейчас мы не готовы предложить вам место.";
      return [{ to: "user", chatId: application.userId, text }];
    }

    case "consultation.created":
      return [{ to: "admins", text: `💬 <b>Новый вопрос</b>\n\n${formatConsultationCard(event.request)}` }];

    case "consultation.answered":
      return [
        {
          to: "user",
          chatId: event.request.userId,
          text: `✉️ <b>Ответ на ваш вопрос #${event.request.id}</b>\n\n${escapeHtml(event.request.answer ?? "")}`
        }
      ];
  }
}

/**
 * Ledger and desk event sink backed by the Bot API. A failed delivery is
 * logged and never reaches the caller.
 */
export class TelegramNotifier implements LedgerEventSink, DeskEventSink {
  constructor(
    private readonly api: MessageSender,
    private readonly adminIds: readonly number[]
  ) {}

  async publish(event: BotEvent): Promise<void> {
    for (const message of renderEvent(event)) {
      if (message.to === "admins") {
        await notifyAdmins(this.api, this.adminIds, message.text, { html: true });
        continue;
      }
      try {
        await this.api.sendMessage(message.chatId, message.text, { parse_mode: "HTML" });
      } catch (e) {
        log.error(`could not deliver ${event.type} to ${message.chatId}`, e);
      }
    }
  }
}
