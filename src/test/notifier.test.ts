import { describe, it, expect, vi } from "vitest";
import { TelegramNotifier, renderEvent } from "../bot/notifier.js";
import { formatEarnings } from "../bot/ui/format.js";
import type { ConsultationRequest, TeamApplication } from "../desk/types.js";
import type { ClientOrder, ReferralEarning, ReferralPayout } from "../ledger/types.js";

const order: ClientOrder = {
  id: 7,
  userId: 200,
  username: "client",
  orderType: "bot",
  projectName: "Shop <beta>",
  functionality: "Catalogue",
  deadlines: "2 weeks",
  budget: "50000",
  status: "paid",
  finalPrice: 40000,
  adminNotes: null,
  createdAt: new Date(Date.UTC(2024, 2, 5)),
  updatedAt: null
};

const earning: ReferralEarning = {
  id: 3,
  referrerId: 100,
  referredUserId: 200,
  orderId: 7,
  orderAmount: 40000,
  commissionRate: 0.25,
  earnedAmount: 10000,
  status: "confirmed",
  createdAt: new Date(Date.UTC(2024, 2, 5)),
  confirmedAt: new Date(Date.UTC(2024, 2, 5)),
  paidAt: null
};

const payout: ReferralPayout = {
  id: 4,
  referrerId: 100,
  amount: 5000,
  method: "sbp",
  recipientInfo: "СБП: +79123456789, Ivanov Ivan",
  status: "failed",
  adminNotes: "wrong phone",
  transactionDetails: null,
  createdAt: new Date(Date.UTC(2024, 2, 6)),
  processedAt: null,
  completedAt: null
};

describe("renderEvent", () => {
  it("tells the client and the referrer about a payment", () => {
    expect(renderEvent({ type: "order.paid", order, earning })).toEqual([
      { to: "user", chatId: 200, text: "💰 Оплата заказа #7 подтверждена. Приступаем к работе!" },
      {
        to: "user",
        chatId: 100,
        text:
          "🎉 <b>Новое начисление!</b>\n\nВаш реферал оплатил заказ на 40 000.00₽.\nВам начислено: <b>10 000.00₽</b>"
      }
    ]);
    expect(renderEvent({ type: "order.paid", order, earning: null })).toHaveLength(1);
  });

  it("escapes user text", () => {
    expect(renderEvent({ type: "order.rejected", order, reason: "<spam>" })).toEqual([
      { to: "user", chatId: 200, text: "❌ Заказ #7 отклонён.\nПричина: &lt;spam&gt;" }
    ]);
    expect(renderEvent({ type: "order.accepted", order, repriced: false })).toEqual([
      {
        to: "user",
        chatId: 200,
        text: "✅ <b>Ваш заказ принят!</b>\n\nЗаказ #7: Shop &lt;beta&gt;\n💰 Стоимость: 40 000.00₽"
      }
    ]);
  });

  it("routes new orders to the admins", () => {
    const [message] = renderEvent({ type: "order.created", order });
    expect(message.to).toBe("admins");
    expect(message.text.split("\n").slice(0, 3)).toEqual([
      "📝 <b>Новая заявка</b>",
      "",
      "<b>Заказ #7</b> — 💰 Оплачен"
    ]);
  });

  it("returns the rejected amount in the message", () => {
    expect(renderEvent({ type: "payout.rejected", payout, reason: "wrong phone" })).toEqual([
      {
        to: "user",
        chatId: 100,
        text: "❌ <b>Выплата отклонена</b>\n\n💰 Сумма: 5 000.00₽ возвращена на баланс.\n📝 Причина: wrong phone"
      }
    ]);
  });
});

const application: TeamApplication = {
  id: 2,
  userId: 300,
  username: "dev",
  fullName: "Anna Smirnova",
  age: "27",
  experience: "4 years",
  stack: "TypeScript",
  about: "Likes bots",
  motivation: "Projects",
  role: "Backend",
  status: "new",
  createdAt: new Date(Date.UTC(2024, 2, 7)),
  updatedAt: null
};

const request: ConsultationRequest = {
  id: 9,
  userId: 400,
  username: null,
  question: "Is <b> allowed?",
  answer: "Use & escape",
  status: "answered",
  createdAt: new Date(Date.UTC(2024, 2, 8)),
  updatedAt: null
};

describe("renderEvent for desk requests", () => {
  it("shows a new team application to the admins", () => {
    const [message] = renderEvent({ type: "team.applied", application });
    expect(message.to).toBe("admins");
    expect(message.text.split("\n").slice(0, 4)).toEqual([
      "👥 <b>Новая заявка в команду</b>",
      "",
      "<b>Заявка в команду #2</b> — 🆕 Новая",
      "Пользователь: @dev (300)"
    ]);
  });

  it("tells the applicant about the decision", () => {
    expect(renderEvent({ type: "team.decided", application: { ...application, status: "accepted" } })).toEqual([
      {
        to: "user",
        chatId: 300,
        text: "🎉 <b>Ваша заявка в команду одобрена!</b>\n\nМы свяжемся с вами в ближайшее время."
      }
    ]);
    expect(renderEvent({ type: "team.decided", application: { ...application, status: "rejected" } })).toEqual([
      {
        to: "user",
        chatId: 300,
        text: "Спасибо за интерес к нашей команде! Сейчас мы не готовы предложить вам место."
      }
    ]);
  });

  it("routes questions to the admins and answers to the asker", () => {
    const [created] = renderEvent({ type: "consultation.created", request: { ...request, status: "new", answer: null } });
    expect(created).toEqual({
      to: "admins",
      text:
        "💬 <b>Новый вопрос</b>\n\n<b>Консультация #9</b> — 🆕 Новый\nПользователь: — (400)\nВопрос: Is &lt;b&gt; allowed?"
    });
    expect(renderEvent({ type: "consultation.answered", request })).toEqual([
      { to: "user", chatId: 400, text: "✉️ <b>Ответ на ваш вопрос #9</b>\n\nUse &amp; escape" }
    ]);
  });
});

describe("TelegramNotifier", () => {
  it("sends admin messages to every admin as HTML", async () => {
    const sendMessage = vi.fn(async (_chatId: number, _text: string, _other?: { parse_mode?: "HTML" }) => ({}));
    const notifier = new TelegramNotifier({ sendMessage }, [10, 20]);

    await notifier.publish({ type: "order.created", order });

    expect(sendMessage).toHaveBeenCalledTimes(2);
    expect(sendMessage.mock.calls.map((c) => c[0])).toEqual([10, 20]);
    expect(sendMessage.mock.calls[0][2]).toEqual({ parse_mode: "HTML" });
  });

  it("swallows a failed delivery to a user", async () => {
    const sendMessage = vi.fn(async () => {
      throw new Error("bot was blocked by the user");
    });
    const notifier = new TelegramNotifier({ sendMessage }, []);

    await expect(notifier.publish({ type: "payout.approved", payout })).resolves.toBeUndefined();
    expect(sendMessage).toHaveBeenCalledTimes(1);
  });
});

describe("formatEarnings", () => {
  it("shows the last entries with a remainder line", () => {
    const text = formatEarnings([earning, { ...earning, id: 2, status: "paid" }], 1);
    expect(text.split("\n")).toEqual([
      "📜 <b>История начислений</b>",
      "",
      "✅ <b>10 000.00₽</b> (05.03.2024)",
      "   Заказ #7 — 40 000.00₽",
      "",
      "<i>… и ещё 1</i>",
      "",
      "⏳ ожидает · ✅ начислено · 💸 выплачено"
    ]);
  });
});
