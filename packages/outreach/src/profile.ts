export interface RecipientProfile {
  name: string;
  title: string;
  companyName: string;
  linkedinProfileUrl?: string | undefined;
}

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Z|a-z]{2,}\b/;

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(raw: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

/** Profile exports are a list whose first entry is the person; a bare object is accepted too. */
function primaryProfile(value: unknown): JsonObject | null {
  if (Array.isArray(value)) {
    const [first] = value;
    return isObject(first) ? first : null;
  }
  return isObject(value) ? value : null;
}

function objectList(value: unknown): JsonObject[] {
  return Array.isArray(value) ? value.filter(isObject) : [];
}

function firstString(value: unknown): string | null {
  if (Array.isArray(value)) {
    const [first] = value;
    return typeof first === 'string' && first.length > 0 ? first : null;
  }
  return null;
}

function verifiedEmployerEmail(employers: JsonObject[]): string | null {
  for (const employer of employers) {
    const emails = employer.business_emails;
    if (!isObject(emails)) {
      continue;
    }
    for (const [email, details] of Object.entries(emails)) {
      if (isObject(details) && details.verification_status === 'verified') {
        return email;
      }
    }
  }
  return null;
}

export function extractEmailFromText(text: string): string | null {
  return EMAIL_PATTERN.exec(text)?.[0] ?? null;
}

/**
 * Business email first, then the first verified address of a current
 * employer, then of a past employer. Text that is not JSON is scanned for
 * anything that looks like an address.
 */
export function extractEmailFromProfile(rawProfile: string): string | null {
  const parsed = parseJson(rawProfile);
  if (!parsed.ok) {
    return extractEmailFromText(rawProfile);
  }

  const profile = primaryProfile(parsed.value);
  if (!profile) {
    return null;
  }

  return (
    firstString(profile.business_email) ??
    verifiedEmployerEmail(objectList(profile.current_employers)) ??
    verifiedEmployerEmail(objectList(profile.past_employers))
  );
}

export function profileJsonToText(rawProfile: string): string {
  const parsed = parseJson(rawProfile);
  if (!parsed.ok) {
    return rawProfile;
  }

  const profile = primaryProfile(parsed.value);
  if (!profile) {
    return '';
  }

  const lines = ['LinkedIn Profile Summary:'];

  const businessEmail = firstString(profile.business_email);
  if (businessEmail) {
    lines.push(`  Business Email: ${businessEmail}`);
  }

  const currentEmployers = objectList(profile.current_employers);
  if (currentEmployers.length > 0) {
    lines.push('  Current Employment:');
    for (const employer of currentEmployers) {
      lines.push(`    - ${typeof employer.employer_name === 'string' ? employer.employer_name : 'N/A'}`);
      const website = firstString(employer.employer_company_website_domain);
      if (website) {
        lines.push(`      Website: ${website}`);
      }
    }
  }

  const pastEmployers = objectList(profile.past_employers);
  if (pastEmployers.length > 0) {
    lines.push('  Past Employment:');
    for (const employer of pastEmployers) {
      lines.push(`    - ${typeof employer.employer_name === 'string' ? employer.employer_name : 'N/A'}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

export function buildRecipientProfileText(recipient: RecipientProfile): string {
  const lines = [
    'LinkedIn Profile Summary:',
    `  Name: ${recipient.name}`,
    `  Title: ${recipient.title}`,
    `  Company: ${recipient.companyName}`,
  ];
  if (recipient.linkedinProfileUrl) {
    lines.push(`  LinkedIn: ${recipient.linkedinProfileUrl}`);
  }
  return `${lines.join('\n')}\n`;
}
