/**
 * Follow-up diagnostics offered when the first suggested fix did not help.
 *
 * The issue category is detected once from the reported problem. Each category
 * has a follow-up questionnaire (first failed attempt), an advanced fix (second
 * failed attempt) and an extra fix for free-text replies. Categories without
 * their own variant of a stage use the general one.
 */

export type IssueCategory = "image" | "restart" | "overheating" | "power" | "general";

type Stage = "followUp" | "advancedFix" | "extraFix";

const CATEGORY_PATTERNS: Array<{ category: Exclude<IssueCategory, "general">; patterns: RegExp[] }> = [
  { category: "image", patterns: [/image|picture|display quality|blurr?y/i, /zdjęci|obraz|jakość obrazu/i] },
  { category: "restart", patterns: [/restart|reboot|shuts? (?:down|off)|freez/i, /wyłącza|zawiesza/i] },
  { category: "overheating", patterns: [/overheat|\bhot\b|temperature/i, /gorąc|temperatur|przegrzew/i] },
  { category: "power", patterns: [/(?:won't|will not|does not|doesn't) (?:turn|switch|power) on|no power/i, /nie włącza|nie uruchamia/i] },
];

/** First matching category wins, in the order image, restart, overheating, power. */
export function detectIssueCategory(issueDescription: string): IssueCategory {
  for (const { category, patterns } of CATEGORY_PATTERNS) {
    if (patterns.some((p) => p.test(issueDescription))) return category;
  }
  return "general";
}

const PLAYBOOKS: Record<IssueCategory, Partial<Record<Stage, string>>> = {
  image: {
    followUp:
      "I understand the image quality problem is still there. Let's go through a more detailed diagnosis:\n\n" +
      "1. When was the probe last cleaned?\n" +
      "2. Does the problem occur in every examination or only under certain conditions?\n" +
      "3. Have you tried different brightness, contrast and focus settings?\n" +
      "4. Did the problem appear suddenly, or has the quality been getting worse gradually?\n\n" +
      "Your answers will help me understand the problem better.",
    advancedFix:
      "Thank you for the additional information. Let's try one more fix for the image quality:\n\n" +
      "1. Restore the factory settings via Settings > System > Reset device.\n" +
      "2. Clean the probe thoroughly with a dedicated probe cleaner (no alcohol or abrasives).\n" +
      "3. Check the cable connection between the probe and the main unit.\n" +
      "4. Restart the device and run the calibration test from the Diagnostics menu.\n\n" +
      "Has the image quality improved after these steps?",
    extraFix:
      "Thank you for the additional information. Based on these details I suggest the following for the image quality problem:\n\n" +
      "1. Run a full calibration from the service menu (hold the power button and the F2 key while switching on).\n" +
      "2. Check that all image filters are configured correctly.\n" +
      "3. Switch the device to diagnostic mode, which gives a better test image.\n\n" +
      "Were you able to do this, and did it help?",
  },
  restart: {
    followUp:
      "I understand the device still restarts. Let's go through a more detailed diagnosis:\n\n" +
      "1. Does the device restart at specific moments, e.g. during particular operations?\n" +
      "2. Are any error messages shown before it switches off?\n" +
      "3. Does the problem get worse when the device is used for a long time?\n" +
      "4. Have you tried connecting the device to a different power source?\n\n" +
      "This information will help me understand the nature of the problem.",
    advancedFix:
      "Thank you for the additional information. Let's try a more advanced fix for the restarts:\n\n" +
      "1. Update the device software to the latest version.\n" +
      "2. Restore the factory settings via Settings > System > Factory reset.\n" +
      "3. Check whether the problem also occurs on battery power, if the device has a battery.\n" +
      "4. Move other electronic devices away to rule out electromagnetic interference.\n\n" +
      "Did any of these steps help?",
    extraFix:
      "Thank you for the additional information. Based on these details I suggest the following for the restarts:\n\n" +
      "1. Run the hardware diagnostics from the boot menu (hold the function key while switching on).\n" +
      "2. Check the system logs for the cause of the restarts.\n" +
      "3. If possible, power the device through a voltage stabiliser to rule out supply problems.\n\n" +
      "Were you able to do this, and did it help?",
  },
  overheating: {
    followUp:
      "I understand the device still overheats. Let's go through a more detailed diagnosis:\n\n" +
      "1. How long is the device switched on before it gets hot?\n" +
      "2. Does the device stand on a flat surface with good ventilation?\n" +
      "3. Have you noticed any change in performance while it is running?\n" +
      "4. Can you hear the fans working inside the device?\n\n" +
      "These details will help me understand the overheating problem.",
  },
  power: {
    followUp:
      "I understand the device still does not turn on. Let's go through a more detailed diagnosis:\n\n" +
      "1. Are there any signs of activity on the device (LEDs, sounds)?\n" +
      "2. Have you tried a different power outlet?\n" +
      "3. Is the power cable in good condition and properly connected?\n" +
      "4. Did anything happen before the problem started (a fall, liquid spill)?\n\n" +
      "This information is key for further diagnosis.",
  },
  general: {
    followUp:
      "I understand the first solution did not help. Let's go through a more detailed diagnosis:\n\n" +
      "1. When exactly did the problem appear and how often does it occur?\n" +
      "2. Does it occur under specific conditions or during specific tasks?\n" +
      "3. Did the device work normally before, or did you notice any unusual behaviour?\n" +
      "4. Have you already tried to fix it yourself?\n\n" +
      "This additional information will help me understand the problem.",
    advancedFix:
      "Thank you for the additional information. Let's try one more fix:\n\n" +
      "1. Disconnect the device from power for at least 5 minutes.\n" +
      "2. Check that the connectors and cables are properly connected and undamaged.\n" +
      "3. If the device has a reset button (often a small hole you can press with a paper clip), use it.\n" +
      "4. Reconnect the device and try to switch it on.\n\n" +
      "Have you noticed any improvement after these steps?",
    extraFix:
      "Thank you for the additional information. Based on it I suggest the following:\n\n" +
      "1. Run a full device diagnostic from the service menu.\n" +
      "2. Check whether software updates are available for your device model.\n" +
      "3. Clear the device cache.\n\n" +
      "Were you able to do this, and did it help?",
  },
};

function playbookText(category: IssueCategory, stage: Stage): string {
  return PLAYBOOKS[category][stage] ?? PLAYBOOKS.general[stage] ?? "";
}

export function followUpQuestions(category: IssueCategory): string {
  return playbookText(category, "followUp");
}

export function advancedFix(category: IssueCategory): string {
  return playbookText(category, "advancedFix");
}

export function extraFix(category: IssueCategory): string {
  return playbookText(category, "extraFix");
}
