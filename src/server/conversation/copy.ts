/**
 * Customer-facing texts of the assistant (markdown).
 */

export type ServiceContact = {
  brandName: string;
  phone: string;
  email: string;
  hours: string;
};

export const ASK_IF_SOLVED = "**Did these instructions solve your problem? (yes/no)**";

export const SERIAL_FORMAT_HINT = `Please enter the serial number in the format: SN: XXXX
(where XXXX is the serial number of your device)`;

export function welcomeMessage(c: ServiceContact): string {
  return `## 👋 Welcome to ${c.brandName} technical support!

I am an AI agent and my job is to help you solve problems with your ${c.brandName} device.

### To continue I need your consent to:

1. Talking to me as an AI agent. I am not a human but an artificial intelligence system. I process the information you enter during the conversation to diagnose and solve the technical problems you describe.

2. ${c.brandName} processing your personal data as the data controller under the GDPR, if a service request has to be created.

### How your data is processed:

* Personal data is collected only when the problem cannot be solved remotely and a service request has to be prepared
* It is used to prepare and handle the service request and for our service team to contact you about it
* It is kept for as long as the service requires and the law demands
* You have the right to access, correct, erase and port your data, to restrict its processing and to object to it
* You may lodge a complaint with the data protection authority if your data is processed contrary to this statement

**Do you consent to the terms above? (yes/no)**

*Note: without your consent to both points we cannot start the conversation or provide technical support.*`;
}

export const CONSENT_THANKS = `### Thank you for your consent! 🙂

To help with the diagnosis I need the serial number of your device. It tells me more about the device and whether it is still under warranty.

**${SERIAL_FORMAT_HINT}**`;

export function consentDeclined(c: ServiceContact): string {
  return `### I understand your decision.

Without your consent we cannot continue the conversation or provide technical support through this assistant.

If you still need help with your device, please contact our service team directly:

**Phone:** ${c.phone}
**E-mail:** ${c.email}

Our specialists are available ${c.hours}.

Thank you for your understanding and have a nice day!`;
}

export const CONSENT_UNCLEAR = `### Sorry, I need a clear answer to continue.

Do you consent to the processing of your personal data under the GDPR in case a service request has to be created?

**Please answer: yes or no**`;

export const ASK_SERIAL = `### I need the serial number of your device

To continue the diagnosis, please enter the serial number in the format: SN: XXXX
(where XXXX is the serial number of your device)

The serial number is printed on the label on the bottom or the back of the device.`;

export function deviceVerified(model: string, warranty: string): string {
  return `### ✅ Device verified:

**Model:** ${model}
**Warranty status:** ${warranty}

Please describe the problem with the device.`;
}

export function deviceNotFound(detail: string): string {
  return `### ❌ Device not found

${detail}

Please check the number and try again.`;
}

export const NEED_MORE_DETAIL = `Thank you for reporting the problem. To help you better I need a few more details.

Could you describe more precisely what is wrong with the device? For example:
- What symptoms have you noticed?
- When did the problem start?
- Does it happen in specific situations?

The more details you give, the better I can diagnose the problem.`;

export const LOW_CONFIDENCE_HINT =
  "_I could not find a close match for this problem in the documentation, so these steps are general. If they do not help, a service visit may be needed._";

export const ANALYSIS_FAILED = "Sorry, something went wrong while analysing the problem. Please try again.";

export const RESOLVED = "I'm glad the problem is solved! Can I help you with anything else?";

export const VISIT_OFFER =
  "I'm very sorry we could not solve the problem remotely. The best option now is a service visit: a technician can examine the device on site and find the cause. " +
  "Please note that a service visit may be chargeable even when the device is under warranty. It depends on the cause of the problem.\n\n" +
  "Would you like to book a service visit? (yes/no)";

export const VISIT_OFFER_ACCEPTED =
  "Thank you. To book a service visit I need to check the available dates. Would you like to see the list of available dates? (yes/no)";

export const VISIT_OFFER_DECLINED =
  "Understood. If you change your mind or the problem comes back, please contact us again. Can I help you with anything else?";

export const VISIT_OFFER_UNCLEAR = "Sorry, I did not understand. Would you like to book a service visit? (yes/no)";

export const ASK_SHOW_SLOTS = "Would you like to see the list of available dates? (yes/no)";

export const PICK_FROM_LIST = "Please choose a date from the list above by typing its number (e.g. 1, 2, 3...)";

export const PICK_NUMBER_OR_OTHER = "Please type the number of a date or type 'other'.";

export const NO_SLOTS = "Sorry, there are no available dates in the coming days. Please try again later.";

export const ASK_PREFERRED_TIME =
  "Understood, none of the dates suits you. Please give your preferred time in the format 'DD.MM HH:MM' or 'weekday HH:MM' (e.g. 'Tuesday 10:00'):";

export const PREFERRED_TIME_UNRECOGNISED =
  "Sorry, I do not recognise that date. Please use the format 'DD.MM HH:MM' or 'weekday HH:MM':";

export const NONE_NEAR_PREFERRED =
  "Unfortunately our technicians have no free dates around that time. Please give another preferred time or type 'all' to see all available dates:";

export function schedulingDeclined(c: ServiceContact): string {
  return `Understood. If you change your mind you can book a visit by phone (${c.phone}) or e-mail (${c.email}).`;
}

export function schedulingUnavailable(c: ServiceContact): string {
  return `Sorry, I cannot check the service calendar right now. Please try again in a moment or book a visit by phone (${c.phone}) or e-mail (${c.email}).`;
}

export function slotOutOfRange(count: number): string {
  return `Please choose a number from 1 to ${count}.`;
}

export function slotList(labels: string[]): string {
  const lines = labels.map((label, i) => `${i + 1}. ${label}`).join("\n");
  return `Available dates:\n\n${lines}\n\nPlease choose a date by typing its number (e.g. 1, 2, 3...) or type 'other' if none of them suits you.`;
}

export function nearbySlotList(labels: string[]): string {
  const lines = labels.map((label, i) => `${i + 1}. ${label}`).join("\n");
  return `I found these free dates close to your preference:\n${lines}\n\nPlease choose a date by typing its number:`;
}

export const SLOT_SELECTED =
  "The date has been selected. Now I need a few contact details. Please enter the full name of the person reporting the problem:";

export const ASK_PHONE = "Thank you. Please enter a contact phone number:";
export const INVALID_PHONE = "That phone number does not look right. Please enter a valid number:";
export const ASK_EMAIL = "Thank you. Please enter your e-mail address:";
export const INVALID_EMAIL = "That e-mail address does not look right. Please enter a valid address:";
export const ASK_ADDRESS = "Thank you. Please enter the address where the technician should come:";
export const SELECT_SLOT_FIRST = "Please choose a visit date first. Would you like to see the list of available dates? (yes/no)";

export function confirmDetails(d: {
  name: string;
  phone: string;
  email: string;
  address: string;
  date: string;
}): string {
  return `Please confirm your details:

Full name: ${d.name}
Phone: ${d.phone}
E-mail: ${d.email}
Address: ${d.address}
Date: ${d.date}

Are all details correct? (yes/no)`;
}

export const BOOKING_CONFIRMED =
  "Thank you! The service visit has been scheduled. You will receive a confirmation at the e-mail address you gave. " +
  "Our service team will call you within 24 hours to confirm the date; a visit that is not confirmed by phone within 24 hours is cancelled automatically.";

export function bookingFailed(detail: string): string {
  return `Sorry, an error occurred while booking the visit: ${detail}`;
}

export const REENTER_DETAILS = "Understood. Let's enter the details again. Please enter the full name:";

export const CONFIRMATION_UNCLEAR = "Sorry, I did not understand. Are the details correct? (yes/no)";

export const START_OVER = `What else can I help you with?

To check a device, ${SERIAL_FORMAT_HINT.replace("Please enter", "please enter")}`;

export function goodbye(c: ServiceContact): string {
  return `Thank you for using the ${c.brandName} assistant. If you need help, I am here for you. Goodbye! 👋`;
}

export const UNEXPECTED_ERROR = "Sorry, an error occurred. Please try again or contact the service team.";
