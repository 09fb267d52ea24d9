export type LoanStatus = 'active' | 'closed';

export type Customer = {
  id: number;
  firstName: string;
  lastName: string;
  age: number | null;
  phoneNumber: string;
  monthlyIncome: number;
  approvedLimit: number;
};

export type LoanRecord = {
  id: number;
  customerId: number;
  principal: number;
  interestRate: number; // annual percent
  tenureMonths: number;
  monthlyInstallment: number;
  emisPaidOnTime: number;
  startDate: string | null; // YYYY-MM-DD
  endDate: string | null;   // YYYY-MM-DD
  status: LoanStatus;
};

/** A loan before the store assigns it an id and derives its installment. */
export type LoanDraft = Omit<LoanRecord, 'id' | 'monthlyInstallment'>;

export type LoanRequest = {
  customerId: number;
  principal: number;
  interestRate: number;
  tenureMonths: number;
};

export type RejectionReason = 'band_floor' | 'rate_mismatch' | 'income_burden';

export type Decision =
  | { kind: 'approved'; rate: number }
  | { kind: 'approved_corrected'; rate: number; requestedRate: number }
  | { kind: 'rejected'; reason: RejectionReason };

export type ScoreComponentName = 'paymentHistory' | 'loanCount' | 'currentActivity' | 'volume';

export type ScoreComponent = {
  raw: number;
  normalized: number; // 0..100
  weight: number;     // percent
  contribution: number;
};

export type ScoreBreakdown = {
  components: Record<ScoreComponentName, ScoreComponent>;
  weighted: number;
  activePrincipal: number;
  overLimit: boolean;
  score: number; // 0..100 integer
};

export type EligibilityResult = {
  customerId: number;
  principal: number;
  tenureMonths: number;
  requestedRate: number;
  correctedRate: number;
  score: number;
  breakdown: ScoreBreakdown | null;
  monthlyInstallment: number;
  existingMonthlyEMITotal: number;
  approved: boolean;
  decision: Decision;
  rejectionReason: RejectionReason | null;
};

export type CreateLoanOutcome =
  | { approved: true; loan: LoanRecord; result: EligibilityResult }
  | { approved: false; result: EligibilityResult };
