import { Resend } from "resend";
import { escapeHtml } from "@/lib/html";

export type VisitConfirmationEmail = {
  to: string;
  customerName: string;
  visitDate: string;
  deviceModel: string;
  serialNumber: string;
  issueDescription: string;
  /** Shown as a checklist so the customer can prepare for the technician. */
  questions: string[];
  brandName: string;
  servicePhone: string;
  serviceEmail: string;
};

export interface VisitMailer {
  sendVisitConfirmation(params: VisitConfirmationEmail): Promise<void>;
}

export function buildVisitConfirmationSubject(params: VisitConfirmationEmail): string {
  return `${params.brandName} service visit: ${params.visitDate}`;
}

export function buildVisitConfirmationHtml(params: VisitConfirmationEmail): string {
  const questions = params.questions.map((q) => `<li>${escapeHtml(q)}</li>`).join("\n");

  return `
  <div style="font-family: ui-sans-serif, system-ui, -apple-system, Segoe UI, Roboto, Arial; line-height:1.4">
    <h2 style="margin:16px 0 8px 0">Service visit booked</h2>

    <div style="margin:8px 0">Dear ${escapeHtml(params.customerName)},</div>
    <div style="margin:8px 0">your service visit has been scheduled for <b>${escapeHtml(params.visitDate)}</b>.</div>

    <div style="margin:12px 0">
      <div><b>Device:</b> ${escapeHtml(params.deviceModel)} (SN: ${escapeHtml(params.serialNumber)})</div>
      <div style="margin-top:8px"><b>Reported problem:</b></div>
      <div style="white-space:pre-wrap">${escapeHtml(params.issueDescription)}</div>
    </div>

    <div style="margin:12px 0">
      <b>Before the visit, please prepare answers to these questions:</b>
      <ol>
${questions}
      </ol>
    </div>

    <hr style="margin:16px 0" />

    <div style="color:#444">
      <div>Our service team will call you within 24 hours to confirm the date.</div>
      <div>Phone: ${escapeHtml(params.servicePhone)} | E-mail: ${escapeHtml(params.serviceEmail)}</div>
    </div>
  </div>
  `;
}

export function createResendMailer(params: { apiKey: string; from: string }): VisitMailer {
  const resend = new Resend(params.apiKey);

  return {
    async sendVisitConfirmation(email) {
      const res = await resend.emails.send({
        from: params.from,
        to: email.to,
        subject: buildVisitConfirmationSubject(email),
        html: buildVisitConfirmationHtml(email),
      });

      if (res.error) {
        throw new Error(res.error.message);
      }
    },
  };
}
