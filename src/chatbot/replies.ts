// Customer-facing chatbot texts

export const replies = {
  missingDetails: '⚠️ Some details are missing. Please complete the form.',

  saveFailed:
    '❌ *Oops! Something went wrong while processing your request.*\n' +
    'Please try again in a few moments.',

  outageDuplicate: (name: string, id: string) =>
    `⚠️ Hello ${name}, your outage was already reported today.\n` +
    `🧾 *Job Order ID:* \`${id}\`\n` +
    '✅ Our team is already working on it.',

  outageLogged: (name: string, id: string, address: string, contact: string) =>
    `✅ Thank you ${name}! Your outage report has been logged.\n` +
    `📄 *Job Order ID:* \`${id}\`\n` +
    `📍 *Location:* ${address}\n` +
    `📱 *Contact:* ${contact}\n` +
    'Our crew is on the way to check and determine the cause of the power outage. Thank you for your patience.',

  meterSubmitted: (name: string, id: string) =>
    `✅ Thank you, *${name}*! Your meter concern has been successfully submitted.\n` +
    `📝 Job Order ID: *${id}*\n` +
    '📞 Please expect a call from our crew for the inspection schedule.',

  agentRecorded: (name: string, concern: string, contact: string) =>
    `✅ *Thank you, ${name}!* Your concern has been successfully recorded.\n\n` +
    `📌 *Concern:* _${concern}_\n` +
    `📞 *Contact Number:* \`${contact}\``,

  queuePosition: (position: number) =>
    '🙏 We appreciate your patience.\n' +
    `You are currently *#${position}* in the queue.\n` +
    'Please stay connected, one of our agents will reach out shortly!',

  followUpNotFound: (ref: string) =>
    `❗ No report found with Job Order \`${ref}\`.\nPlease double-check the number.`,

  followUpResolved: (ref: string) =>
    '✅ Thank you for your patience.\n\n' +
    `🧾 *Job Order ID:* \`${ref}\`\n` +
    '📌 Your report has been resolved.\n' +
    'If you still face issues, feel free to report again.',

  followUpInProgress: (status: string) =>
    '📄 Thank you for your patience.\n\n' +
    `🔄 *Current Status:* \`${status}\`\n\n` +
    "🙏 We're working to resolve the issue.",

  followUpStatus: (ref: string, status: string) =>
    `📌 Status update for \`${ref}\` is: \`${status}\`.\n\nThank you for your understanding.`,

  served: (name: string) => `👤 *${name}* has now been served and removed from the queue.`,
  queueEmpty: '🎉 No more users in the queue.',
  serveFailed: '❌ Failed to serve next user.',
};
