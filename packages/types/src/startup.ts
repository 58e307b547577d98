export type StartupStatus = 'Ignore' | 'Watch' | 'Interesting';

export interface MomentumPoint {
  month: string;
  hiring: number;
  buzz: number;
  events?: string[];
}

export interface Startup {
  id: string;
  name: string;
  sector: string;
  stage: string;
  country: string;
  description: string;
  status: StartupStatus;
  /** Composite of hiring, buzz and event signals, 0-100 */
  signalScore: number;
  overview: string;
  momentum: MomentumPoint[];
  notes: string;
}

export interface StartupSummary {
  id: string;
  name: string;
  sector: string;
  stage: string;
  country: string;
  status: StartupStatus;
  signalScore: number;
  description: string;
}
