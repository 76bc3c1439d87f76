import { describe, it, expect } from "vitest";
import { toConsultationRequest } from "../db/repos/consultationsRepo.js";
import { toEarning } from "../db/repos/earningsRepo.js";
import { buildOrderUpdate, toClientOrder } from "../db/repos/ordersRepo.js";
import { toPayout } from "../db/repos/payoutsRepo.js";
import { toPortfolioProject } from "../db/repos/portfolioRepo.js";
import { toReferralUser } from "../db/repos/referralUsersRepo.js";
import { toTeamApplication } from "../db/repos/teamApplicationsRepo.js";
import type {
  ClientOrderRow,
  ConsultationRequestRow,
  PortfolioProjectRow,
  ReferralEarningRow,
  ReferralPayoutRow,
  ReferralUserRow,
  TeamApplicationRow
} from "../db/types.js";

const createdAt = new Date("2024-03-01T10:00:00Z");

describe("row mappers", () => {
  it("maps a referral user row, converting BIGINT and NUMERIC strings", () => {
    const row: ReferralUserRow = {
      user_id: "5000000001",
      username: "partner",
      referral_code: "ABCDEFGH",
      referred_by: "42",
      payout_method: "sbp",
      card_number: null,
      phone_number: "+79991234567",
      full_name: "Ivan Petrov",
      total_referrals: 3,
      total_earned: "10000.50",
      total_paid: "5000.00",
      balance: "5000.50",
      created_at: createdAt,
      updated_at: null
    };

    expect(toReferralUser(row)).toEqual({
      userId: 5000000001,
      username: "partner",
      referralCode: "ABCDEFGH",
      referredBy: 42,
      payoutMethod: "sbp",
      cardNumber: null,
      phoneNumber: "+79991234567",
      fullName: "Ivan Petrov",
      totalReferrals: 3,
      totalEarned: 10000.5,
      totalPaid: 5000,
      balance: 5000.5,
      createdAt,
      updatedAt: null
    });
  });

  it("keeps a missing referrer as null", () => {
    const row: ReferralUserRow = {
      user_id: "7",
      username: null,
      referral_code: "JKMNPQRS",
      referred_by: null,
      payout_method: "card",
      card_number: "1234 **** **** 3456",
      phone_number: null,
      full_name: null,
      total_referrals: 0,
      total_earned: "0.00",
      total_paid: "0.00",
      balance: "0.00",
      created_at: createdAt,
      updated_at: createdAt
    };

    expect(toReferralUser(row)).toMatchObject({ userId: 7, referredBy: null, balance: 0, updatedAt: createdAt });
  });

  it("maps an order row with and without a final price", () => {
    const row: ClientOrderRow = {
      id: 11,
      user_id: "200",
      username: "client",
      order_type: "miniapp",
      project_name: "Shop",
      functionality: "Catalogue",
      deadlines: "1 month",
      budget: "100000",
      status: "accepted",
      final_price: "40000.00",
      admin_notes: "two stages",
      created_at: createdAt,
      updated_at: null
    };

    expect(toClientOrder(row)).toMatchObject({ id: 11, userId: 200, orderType: "miniapp", finalPrice: 40000 });
    expect(toClientOrder({ ...row, status: "new", final_price: null }).finalPrice).toBeNull();
  });

  it("maps an earning row", () => {
    const row: ReferralEarningRow = {
      id: 3,
      referrer_id: "100",
      referred_user_id: "200",
      order_id: 11,
      order_amount: "333.33",
      commission_rate: "0.2500",
      earned_amount: "83.33",
      status: "confirmed",
      created_at: createdAt,
      confirmed_at: createdAt,
      paid_at: null
    };

    expect(toEarning(row)).toEqual({
      id: 3,
      referrerId: 100,
      referredUserId: 200,
      orderId: 11,
      orderAmount: 333.33,
      commissionRate: 0.25,
      earnedAmount: 83.33,
      status: "confirmed",
      createdAt,
      confirmedAt: createdAt,
      paidAt: null
    });
  });

  it("maps a payout row", () => {
    const row: ReferralPayoutRow = {
      id: 5,
      referrer_id: "100",
      amount: "5000.00",
      method: "card",
      recipient_info: "1234 **** **** 3456, Ivan Petrov",
      status: "failed",
      admin_notes: "wrong card",
      transaction_details: null,
      created_at: createdAt,
      processed_at: createdAt,
      completed_at: null
    };

    expect(toPayout(row)).toEqual({
      id: 5,
      referrerId: 100,
      amount: 5000,
      method: "card",
      recipientInfo: "1234 **** **** 3456, Ivan Petrov",
      status: "failed",
      adminNotes: "wrong card",
      transactionDetails: null,
      createdAt,
      processedAt: createdAt,
      completedAt: null
    });
  });
});

describe("desk row mappers", () => {
  it("maps a team application row", () => {
    const row: TeamApplicationRow = {
      id: 2,
      user_id: "5000000300",
      username: null,
      full_name: "Anna Smirnova",
      age: "27",
      experience: "4 years",
      stack: "TypeScript",
      about: "Likes bots",
      motivation: "Projects",
      role: "Backend",
      status: "accepted",
      created_at: createdAt,
      updated_at: createdAt
    };

    expect(toTeamApplication(row)).toEqual({
      id: 2,
      userId: 5000000300,
      username: null,
      fullName: "Anna Smirnova",
      age: "27",
      experience: "4 years",
      stack: "TypeScript",
      about: "Likes bots",
      motivation: "Projects",
      role: "Backend",
      status: "accepted",
      createdAt,
      updatedAt: createdAt
    });
  });

  it("maps a consultation row", () => {
    const row: ConsultationRequestRow = {
      id: 9,
      user_id: "400",
      username: "asker",
      question: "How long?",
      answer: null,
      status: "new",
      created_at: createdAt,
      updated_at: null
    };

    expect(toConsultationRequest(row)).toEqual({
      id: 9,
      userId: 400,
      username: "asker",
      question: "How long?",
      answer: null,
      status: "new",
      createdAt,
      updatedAt: null
    });
  });

  it("maps a portfolio row to camelCase links", () => {
    const row: PortfolioProjectRow = {
      id: 1,
      title: "Quiz",
      description: "Mini app",
      details: null,
      cost: "от 30 000₽",
      technologies: "grammY",
      duration: null,
      video_url: "https://video.test/quiz.mp4",
      bot_url: "https://t.me/quiz_bot",
      created_at: createdAt,
      updated_at: null
    };

    expect(toPortfolioProject(row)).toMatchObject({
      id: 1,
      cost: "от 30 000₽",
      videoUrl: "https://video.test/quiz.mp4",
      botUrl: "https://t.me/quiz_bot",
      duration: null
    });
  });
});

describe("buildOrderUpdate", () => {
  it("numbers the parameters after the order id in column order", () => {
    const { sql, values } = buildOrderUpdate(7, { adminNotes: null, finalPrice: 40000, status: "accepted" });

    expect(sql).toBe(
      "UPDATE client_orders SET status = $2, final_price = $3, admin_notes = $4, updated_at = now() WHERE id = $1 RETURNING *"
    );
    expect(values).toEqual([7, "accepted", 40000, null]);
  });

  it("only touches updated_at for an empty patch", () => {
    expect(buildOrderUpdate(3, {})).toEqual({
      sql: "UPDATE client_orders SET updated_at = now() WHERE id = $1 RETURNING *",
      values: [3]
    });
  });

  it("ignores keys outside the allow-list", () => {
    const patch = { budget: "90000", user_id: 999, referral_code: "HIJACKED" };

    const { sql, values } = buildOrderUpdate(4, patch);

    expect(sql).toBe("UPDATE client_orders SET budget = $2, updated_at = now() WHERE id = $1 RETURNING *");
    expect(values).toEqual([4, "90000"]);
  });
});
