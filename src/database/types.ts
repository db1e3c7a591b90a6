/**
 * Shared database types and interfaces
 */

export interface JobPostingRow {
  id: number;
  title: string;
  company_name: string;
  city: string;
  state: string;
  country: string;
  location_name: string;
  description: string;
  description_html: string;
  salary_min: string | null;
  salary_max: string | null;
  salary_currency: string;
  salary_period: 'hourly' | 'daily' | 'weekly' | 'monthly' | 'yearly';
  salary_raw_text: string;
  job_type: string;
  work_mode: string;
  job_category: string;
  posted_at: Date;
  posted_ago: string;
  skills: string;
  preferred_skills: string;
  external_url: string;
  external_id: string;
  external_source: string;
  slug: string;
  created_at: Date;
}

export type LogLevel = 'error' | 'warning' | 'info' | 'debug';
