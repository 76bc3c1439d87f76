export type TeamApplicationStatus = "new" | "accepted" | "rejected";
export type ConsultationStatus = "new" | "answered" | "completed";

export type TeamApplicationFields = {
  username: string | null;
  fullName: string;
  age: string;
  experience: string;
  stack: string;
  about: string;
  motivation: string;
  role: string;
};

export type TeamApplication = TeamApplicationFields & {
  id: number;
  userId: number;
  status: TeamApplicationStatus;
  createdAt: Date;
  updatedAt: Date | null;
};

export type ConsultationRequest = {
  id: number;
  userId: number;
  username: string | null;
  question: string;
  answer: string | null;
  status: ConsultationStatus;
  createdAt: Date;
  updatedAt: Date | null;
};

export type PortfolioFields = {
  title: string;
  description: string;
  details: string | null;
  cost: string;
  technologies: string | null;
  duration: string | null;
  videoUrl: string | null;
  botUrl: string | null;
};

export type PortfolioProject = PortfolioFields & {
  id: number;
  createdAt: Date;
  updatedAt: Date | null;
};
