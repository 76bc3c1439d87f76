import type { ConsultationStatus, TeamApplicationStatus } from "../desk/types.js";
import type { EarningStatus, OrderStatus, OrderType, PayoutMethod, PayoutStatus } from "../ledger/types.js";

// BIGINT and NUMERIC columns come back from pg as strings.

export type ReferralUserRow = {
  user_id: string;
  username: string | null;
  referral_code: string;
  referred_by: string | null;
  payout_method: PayoutMethod;
  card_number: string | null;
  phone_number: string | null;
  full_name: string | null;
  total_referrals: number;
  total_earned: string;
  total_paid: string;
  balance: string;
  created_at: Date;
  updated_at: Date | null;
};

export type ClientOrderRow = {
  id: number;
  user_id: string;
  username: string | null;
  order_type: OrderType;
  project_name: string;
  functionality: string;
  deadlines: string;
  budget: string;
  status: OrderStatus;
  final_price: string | null;
  admin_notes: string | null;
  created_at: Date;
  updated_at: Date | null;
};

export type ReferralEarningRow = {
  id: number;
  referrer_id: string;
  referred_user_id: string;
  order_id: number;
  order_amount: string;
  commission_rate: string;
  earned_amount: string;
  status: EarningStatus;
  created_at: Date;
  confirmed_at: Date | null;
  paid_at: Date | null;
};

export type ReferralPayoutRow = {
  id: number;
  referrer_id: string;
  amount: string;
  method: PayoutMethod;
  recipient_info: string | null;
  status: PayoutStatus;
  admin_notes: string | null;
  transaction_details: string | null;
  created_at: Date;
  processed_at: Date | null;
  completed_at: Date | null;
};

export type PayoutSettlementRow = {
  payout_id: number;
  earning_id: number;
  amount: string;
};

export type TeamApplicationRow = {
  id: number;
  user_id: string;
  username: string | null;
  full_name: string;
  age: string;
  experience: string;
  stack: string;
  about: string;
  motivation: string;
  role: string;
  status: TeamApplicationStatus;
  created_at: Date;
  updated_at: Date | null;
};

export type ConsultationRequestRow = {
  id: number;
  user_id: string;
  username: string | null;
  question: string;
  answer: string | null;
  status: ConsultationStatus;
  created_at: Date;
  updated_at: Date | null;
};

export type PortfolioProjectRow = {
  id: number;
  title: string;
  description: string;
  details: string | null;
  cost: string;
  technologies: string | null;
  duration: string | null;
  video_url: string | null;
  bot_url: string | null;
  created_at: Date;
  updated_at: Date | null;
};
