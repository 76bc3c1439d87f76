import { LedgerError } from "../core/errors.js";
import type { LedgerResult } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import { generateReferralCode } from "./referralCodes.js";
import type { CodeGenerator } from "./referralCodes.js";
import type { LedgerRuntime } from "./runtime.js";
import type { LedgerTx } from "./store.js";
import type { PayoutProfile, ReferralStats, ReferralUser } from "./types.js";

const MAX_CODE_ATTEMPTS = 8;

export class ReferralIdentity {
  constructor(
    private readonly runtime: LedgerRuntime,
    private readonly log: Logger,
    private readonly nextCode: CodeGenerator = generateReferralCode
  ) {}

  /** Returns the existing record untouched, or creates one without a referrer. */
  async register(userId: number, username: string | null): Promise<ReferralUser> {
    return this.runtime.run("register", async (tx) => {
      const existing = await tx.users.find(userId);
      if (existing) return existing;
      return this.insertWithFreshCode(tx, userId, username, null);
    });
  }

  /**
   * Attaches `userId` to the owner of `referralCode`. The first referrer wins:
   * once referred_by is set it never changes.
   */
  async linkReferral(userId: number, referralCode: string, username: string | null = null): Promise<LedgerResult<ReferralUser>> {
    return this.runtime.execute("linkReferral", async (tx, emit) => {
      const owner = await tx.users.findByCode(referralCode);
      if (!owner) throw new LedgerError("UNKNOWN_CODE", `no referral code ${referralCode}`);
      if (owner.userId === userId) throw new LedgerError("SELF_REFERRAL", `user ${userId} used own code`);

      const existing = await tx.users.find(userId, { forUpdate: true });
      if (existing && existing.referredBy !== null) {
        throw new LedgerError("ALREADY_REFERRED", `user ${userId} already referred by ${existing.referredBy}`);
      }

      // Held until commit so that concurrent links recount one after another.
      const referrer = await tx.users.find(owner.userId, { forUpdate: true });
      if (!referrer) throw new LedgerError("UNKNOWN_CODE", `no referral code ${referralCode}`);
      if (referrer.referredBy === userId) {
        throw new LedgerError("CIRCULAR_REFERRAL", `user ${referrer.userId} was referred by ${userId}`);
      }

      let linked: ReferralUser | null;
      if (existing) {
        linked = await tx.users.setReferredBy(userId, referrer.userId);
      } else {
        linked = await this.insertWithFreshCode(tx, userId, username, referrer.userId);
      }
      if (!linked || linked.referredBy !== referrer.userId) {
        throw new LedgerError("ALREADY_REFERRED", `user ${userId} was linked concurrently`);
      }

      const total = await tx.users.countReferrals(referrer.userId);
      await tx.users.setTotalReferrals(referrer.userId, total);

      this.log.info(`user ${userId} became referral of ${referrer.userId}`);
      emit({ type: "referral.linked", user: linked, referrer: { ...referrer, totalReferrals: total } });
      return linked;
    });
  }

  async get(userId: number): Promise<ReferralUser | null> {
    return this.runtime.run("getReferralUser", (tx) => tx.users.find(userId));
  }

  async findByCode(referralCode: string): Promise<ReferralUser | null> {
    return this.runtime.run("findReferralUserByCode", (tx) => tx.users.findByCode(referralCode));
  }

  /** Stats for the referral menu; the referral counter is recounted on the way. */
  async getStats(userId: number): Promise<ReferralStats | null> {
    return this.runtime.run("getReferralStats", async (tx) => {
      const user = await tx.users.find(userId);
      if (!user) return null;

      const totalReferrals = await tx.users.countReferrals(userId);
      if (totalReferrals !== user.totalReferrals) {
        await tx.users.setTotalReferrals(userId, totalReferrals);
      }

      return {
        referralCode: user.referralCode,
        totalReferrals,
        totalEarned: user.totalEarned,
        totalPaid: user.totalPaid,
        balance: user.balance,
        payoutMethod: user.payoutMethod,
        cardNumber: user.cardNumber,
        phoneNumber: user.phoneNumber,
        fullName: user.fullName
      };
    });
  }

  async updatePayoutProfile(userId: number, profile: PayoutProfile): Promise<LedgerResult<ReferralUser>> {
    return this.runtime.execute("updatePayoutProfile", async (tx) => {
      const updated = await tx.users.updatePayoutProfile(userId, profile);
      if (!updated) throw new LedgerError("NOT_FOUND", `referral user ${userId} not found`);
      return updated;
    });
  }

  private async insertWithFreshCode(
    tx: LedgerTx,
    userId: number,
    username: string | null,
    referredBy: number | null
  ): Promise<ReferralUser> {
    for (let attempt = 1; attempt <= MAX_CODE_ATTEMPTS; attempt++) {
      const referralCode = this.nextCode();
      const created = await tx.users.insert({ userId, username, referralCode, referredBy });
      if (created) {
        this.log.info(`referral user created: ${userId} code=${referralCode}`);
        return created;
      }

      // Either the code collided or the same user was inserted concurrently.
      const raced = await tx.users.find(userId);
      if (raced) return raced;
      this.log.warn(`referral code collision on ${referralCode} (attempt ${attempt})`);
    }
    throw new Error(`could not allocate a unique referral code for user ${userId}`);
  }
}
