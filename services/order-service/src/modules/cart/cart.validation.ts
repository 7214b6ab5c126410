import { CartLine, CheckoutEvaluation, CheckoutIssue, DeliveryAddress, DeliveryMethod } from "@tapau/types";
import { formatRinggit } from "./cart.pricing";
import { requiresAddress, requiresSchedule } from "./delivery-method";

export interface CheckoutRules {
  minSubtotalCents: number;
  scheduleLeadMinutes: number;
  businessOpenHour: number;
  businessCloseHour: number;
  /** Minutes east of UTC used to read business hours. */
  timezoneOffsetMinutes: number;
}

export interface CheckoutSubject {
  lines: CartLine[];
  deliveryMethod: DeliveryMethod;
  address: DeliveryAddress | null;
  scheduledForIso: string | null;
  subtotalCents: number;
}

export function checkSchedule(scheduledForIso: string, rules: CheckoutRules, now: Date): string | null {
  const scheduledAt = Date.parse(scheduledForIso);
  if (Number.isNaN(scheduledAt)) return "Scheduled time is not a valid date";

  if (scheduledAt - now.getTime() < rules.scheduleLeadMinutes * 60_000) {
    return `Schedule at least ${rules.scheduleLeadMinutes} minutes ahead`;
  }

  const local = new Date(scheduledAt + (rules.timezoneOffsetMinutes * 60_000));
  const minuteOfDay = (local.getUTCHours() * 60) + local.getUTCMinutes();
  if (minuteOfDay < rules.businessOpenHour * 60 || minuteOfDay >= rules.businessCloseHour * 60) {
    return `Scheduled deliveries run from ${clock(rules.businessOpenHour)} to ${clock(rules.businessCloseHour)}`;
  }

  return null;
}

export function evaluateCheckout(subject: CheckoutSubject, rules: CheckoutRules, now: Date): CheckoutEvaluation {
  const issues: CheckoutIssue[] = [];

  if (subject.lines.length === 0) {
    issues.push({ code: "CART_EMPTY", message: "Your cart is empty" });
  }

  if (requiresAddress(subject.deliveryMethod) && !subject.address) {
    issues.push({ code: "ADDRESS_REQUIRED", message: "Select a delivery address" });
  }

  if (requiresSchedule(subject.deliveryMethod)) {
    if (!subject.scheduledForIso) {
      issues.push({ code: "SCHEDULE_REQUIRED", message: "Select a delivery time" });
    } else {
      const problem = checkSchedule(subject.scheduledForIso, rules, now);
      if (problem) issues.push({ code: "SCHEDULE_INVALID", message: problem });
    }
  }

  for (const line of subject.lines) {
    const missing = line.customizations
      .filter((customization) => customization.required && customization.optionIds.length === 0)
      .map((customization) => customization.groupName);
    if (missing.length > 0) {
      issues.push({
        code: "CUSTOMIZATION_REQUIRED",
        message: `${line.name}: choose ${missing.join(", ")}`,
        lineId: line.lineId,
      });
    }

    if (!line.isAvailable) {
      issues.push({
        code: "ITEM_UNAVAILABLE",
        message: `${line.name} is no longer available`,
        lineId: line.lineId,
      });
    }
  }

  if (subject.lines.length > 0 && subject.subtotalCents < rules.minSubtotalCents) {
    issues.push({
      code: "BELOW_MINIMUM_ORDER",
      message: `Minimum order is ${formatRinggit(rules.minSubtotalCents)}`,
    });
  }

  return { allowed: issues.length === 0, issues };
}

function clock(hour: number): string {
  return `${String(hour).padStart(2, "0")}:00`;
}
