import { log } from '../log.js';
import { AppError, InputValidationError, normalizeError } from '../util/errors.js';
import { LoanEngine } from '../loans/engine.js';
import { EligibilityResult, RejectionReason, ScoreComponentName } from '../loans/types.js';
import { getPalette, Palette } from './theme.js';
import { formatMoney, formatRate, keyValues, say, table, Writer } from './ui.js';

export type CliContext = {
  engine: LoanEngine;
  write: Writer;
  palette?: Palette;
};

export const USAGE = [
  'usage: credit-desk <command> [options]',
  '',
  '  register     --first <name> --last <name> --income <monthly> --phone <number> [--age <years>]',
  '  eligibility  --customer <id> --amount <principal> --rate <annual %> --tenure <months>',
  '  apply        --customer <id> --amount <principal> --rate <annual %> --tenure <months>',
  '  loan         <loan id>',
  '  loans        <customer id>',
  '  pay          <loan id>',
  '  close        <loan id>',
];

const EXIT = { ok: 0, failure: 1, input: 2, notFound: 3 } as const;

export function flag(args: string[], name: string): string | undefined {
  const key = `--${name}`;
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a === key) return args[i + 1];
    if (a.startsWith(`${key}=`)) return a.slice(key.length + 1);
  }
  return undefined;
}

function requireFlag(args: string[], name: string): string {
  const v = flag(args, name);
  if (v === undefined || v.startsWith('--')) throw new InputValidationError(`--${name} is required`);
  return v;
}

function toNumber(raw: string, label: string): number {
  const n = Number(raw.replace(/[_,]/g, ''));
  if (raw.trim() === '' || !Number.isFinite(n)) throw new InputValidationError(`${label} must be a number, got "${raw}"`);
  return n;
}

function numFlag(args: string[], name: string): number {
  return toNumber(requireFlag(args, name), `--${name}`);
}

function positional(args: string[], label: string): number {
  const raw = args.find((a) => !a.startsWith('--'));
  if (raw === undefined) throw new InputValidationError(`${label} is required`);
  return toNumber(raw, label);
}

const COMPONENT_ORDER: ScoreComponentName[] = ['paymentHistory', 'loanCount', 'currentActivity', 'volume'];

const COMPONENT_LABELS: Record<ScoreComponentName, string> = {
  paymentHistory: 'payment history',
  loanCount: 'loan count',
  currentActivity: 'current activity',
  volume: 'volume',
};

const REJECTION_LABELS: Record<RejectionReason, string> = {
  band_floor: 'score below every band',
  rate_mismatch: 'rate below band floor',
  income_burden: 'income burden',
};

export function describeDecision(r: EligibilityResult): string {
  switch (r.decision.kind) {
    case 'approved': return 'approved';
    case 'approved_corrected': return `approved at corrected rate ${formatRate(r.decision.rate)}`;
    case 'rejected': return `rejected (${REJECTION_LABELS[r.decision.reason]})`;
  }
}

export function renderEligibility(r: EligibilityResult, palette: Palette): string[] {
  const lines = keyValues([
    ['customer', r.customerId],
    ['score', r.score],
    ['decision', describeDecision(r)],
    ['requested rate', formatRate(r.requestedRate)],
    ['corrected rate', formatRate(r.correctedRate)],
    ['tenure', `${r.tenureMonths} months`],
    ['monthly installment', formatMoney(r.monthlyInstallment)],
    ['existing EMIs', formatMoney(r.existingMonthlyEMITotal)],
  ], palette);
  if (r.breakdown) {
    const rows = COMPONENT_ORDER.map((name) => {
      const c = r.breakdown?.components[name];
      return {
        component: COMPONENT_LABELS[name],
        normalized: c ? c.normalized.toFixed(1) : '-',
        weight: c ? `${c.weight}%` : '-',
        points: c ? c.contribution.toFixed(1) : '-',
      };
    });
    lines.push('', ...table(rows, palette));
    if (r.breakdown.overLimit) lines.push(palette.warn('active principal exceeds the approved limit; score forced to 0'));
  }
  return lines;
}

async function dispatch(cmd: string | undefined, args: string[], ctx: CliContext, palette: Palette): Promise<number> {
  const { engine, write } = ctx;
  const emit = (lines: string[]) => lines.forEach((l) => write(l));

  switch (cmd) {
    case 'register': {
      const ageRaw = flag(args, 'age');
      const c = await engine.registerCustomer({
        firstName: requireFlag(args, 'first'),
        lastName: requireFlag(args, 'last'),
        monthlyIncome: numFlag(args, 'income'),
        phoneNumber: requireFlag(args, 'phone'),
        age: ageRaw === undefined ? null : toNumber(ageRaw, '--age'),
      });
      say(write, `registered customer ${c.id}`, 'success', palette);
      emit(keyValues([
        ['name', `${c.firstName} ${c.lastName}`],
        ['monthly income', formatMoney(c.monthlyIncome)],
        ['approved limit', formatMoney(c.approvedLimit)],
        ['phone', c.phoneNumber],
      ], palette));
      return EXIT.ok;
    }
    case 'eligibility': {
      const r = await engine.checkEligibility(numFlag(args, 'customer'), numFlag(args, 'amount'), numFlag(args, 'rate'), numFlag(args, 'tenure'));
      emit(renderEligibility(r, palette));
      return EXIT.ok;
    }
    case 'apply': {
      const out = await engine.createLoan(numFlag(args, 'customer'), numFlag(args, 'amount'), numFlag(args, 'rate'), numFlag(args, 'tenure'));
      if (out.approved) {
        say(write, `loan ${out.loan.id} approved`, 'success', palette);
        emit(keyValues([
          ['principal', formatMoney(out.loan.principal)],
          ['rate', formatRate(out.loan.interestRate)],
          ['monthly installment', formatMoney(out.loan.monthlyInstallment)],
          ['ends', out.loan.endDate ?? '-'],
        ], palette));
      } else {
        say(write, 'loan not approved', 'warn', palette);
        emit(renderEligibility(out.result, palette));
      }
      return EXIT.ok;
    }
    case 'loan': {
      const { loan, customer } = await engine.viewLoan(positional(args, 'loan id'));
      emit(keyValues([
        ['loan', loan.id],
        ['customer', `${customer.firstName} ${customer.lastName} (${customer.id})`],
        ['phone', customer.phoneNumber],
        ['principal', formatMoney(loan.principal)],
        ['rate', formatRate(loan.interestRate)],
        ['monthly installment', formatMoney(loan.monthlyInstallment)],
        ['tenure', `${loan.tenureMonths} months`],
        ['status', loan.status],
      ], palette));
      return EXIT.ok;
    }
    case 'loans': {
      const loans = await engine.viewLoans(positional(args, 'customer id'));
      emit(table(loans.map((l) => ({
        loan: l.loanId,
        principal: formatMoney(l.principal),
        rate: formatRate(l.interestRate),
        emi: formatMoney(l.monthlyInstallment),
        left: l.repaymentsLeft,
      })), palette));
      return EXIT.ok;
    }
    case 'pay': {
      const loan = await engine.recordOnTimePayment(positional(args, 'loan id'));
      say(write, `loan ${loan.id}: ${loan.emisPaidOnTime}/${loan.tenureMonths} installments paid on time${loan.status === 'closed' ? ', closed' : ''}`, 'success', palette);
      return EXIT.ok;
    }
    case 'close': {
      const loan = await engine.closeLoan(positional(args, 'loan id'));
      say(write, `loan ${loan.id} closed`, 'success', palette);
      return EXIT.ok;
    }
    case 'help':
    case undefined:
      emit(USAGE);
      return EXIT.ok;
    default:
      say(write, `unknown command "${cmd}"`, 'error', palette);
      emit(USAGE);
      return EXIT.input;
  }
}

/** Run one CLI invocation and return the process exit code. */
export async function runCommand(argv: string[], ctx: CliContext): Promise<number> {
  const palette = ctx.palette ?? getPalette();
  const [cmd, ...args] = argv;
  try {
    return await dispatch(cmd, args, ctx, palette);
  } catch (err) {
    if (err instanceof AppError) {
      say(ctx.write, err.message, 'error', palette);
      return err.code === 'NOT_FOUND' ? EXIT.notFound : err.code === 'INPUT_VALIDATION' ? EXIT.input : EXIT.failure;
    }
    log.error({ msg: 'command_failed', command: cmd, error: normalizeError(err) });
    say(ctx.write, `${cmd} failed: ${normalizeError(err).message}`, 'error', palette);
    return EXIT.failure;
  }
}
