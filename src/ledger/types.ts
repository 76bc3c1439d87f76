export type OrderType = "bot" | "miniapp";
export type OrderStatus = "new" | "accepted" | "rejected" | "completed" | "paid";
export type EarningStatus = "pending" | "confirmed" | "paid";
export type PayoutStatus = "requested" | "processing" | "completed" | "failed";
export type PayoutMethod = "card" | "sbp" | "manual";

export type ReferralUser = {
  userId: number;
  username: string | null;
  referralCode: string;
  referredBy: number | null;
  payoutMethod: PayoutMethod;
  cardNumber: string | null; // masked
  phoneNumber: string | null;
  fullName: string | null;
  totalReferrals: number;
  totalEarned: number;
  totalPaid: number;
  balance: number;
  createdAt: Date;
  updatedAt: Date | null;
};

export type PayoutProfile = {
  payoutMethod: PayoutMethod;
  cardNumber: string | null;
  phoneNumber: string | null;
  fullName: string | null;
};

export type ReferralStats = PayoutProfile & {
  referralCode: string;
  totalReferrals: number;
  totalEarned: number;
  totalPaid: number;
  balance: number;
};

export type OrderFields = {
  username: string | null;
  orderType: OrderType;
  projectName: string;
  functionality: string;
  deadlines: string;
  budget: string;
};

export type ClientOrder = OrderFields & {
  id: number;
  userId: number;
  status: OrderStatus;
  finalPrice: number | null;
  adminNotes: string | null;
  createdAt: Date;
  updatedAt: Date | null;
};

export type ReferralEarning = {
  id: number;
  referrerId: number;
  referredUserId: number;
  orderId: number;
  orderAmount: number;
  commissionRate: number;
  earnedAmount: number;
  status: EarningStatus;
  createdAt: Date;
  confirmedAt: Date | null;
  paidAt: Date | null;
};

/** A confirmed earning together with what earlier payouts already settled of it. */
export type UnsettledEarning = ReferralEarning & { settledAmount: number };

export type ReferralPayout = {
  id: number;
  referrerId: number;
  amount: number;
  method: PayoutMethod;
  recipientInfo: string | null;
  status: PayoutStatus;
  adminNotes: string | null;
  transactionDetails: string | null;
  createdAt: Date;
  processedAt: Date | null;
  completedAt: Date | null;
};

export type PayoutSettlement = {
  payoutId: number;
  earningId: number;
  amount: number;
};
