/**
 * Shape of the data extracted from a resume Markdown file. These are type
 * aliases rather than interfaces so they stay assignable to StructuredValue.
 */

export type PersonName = {
  full_name: string;
  first_name: string;
  last_name: string;
};

export type PersonalInfoItem = {
  label: string;
  value: string;
  href: string | null;
};

export type Skill = {
  name: string;
  percent: number;
};

// `href` is present only for linked items, so `{{#href}}` sections work.
export type LinkItem = { text: string } | { text: string; href: string };

export type ExperienceBullet = {
  lead: string;
  text: string;
};

export type ExperienceEntry = {
  dates: string;
  title: string;
  company: string;
  description: string;
  bullets: ExperienceBullet[];
};

export type ResumeData = {
  person: PersonName;
  personal_info: PersonalInfoItem[];
  summary: string;
  skills: Skill[];
  certs_education: LinkItem[];
  acknowledgments: LinkItem[];
  experience: ExperienceEntry[];
  keywords: string;
};
