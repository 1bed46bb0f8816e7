import { JobRecord } from "../../shared/types/job.types";

export const truckDriverJob: JobRecord = {
  id: "pl-lyon-01",
  title: "Chauffeur PL",
  company: "Transports Alpins",
  location: "Lyon",
  salary: 32000,
  industry: "Transport",
  description: "Transport régional de marchandises en poids lourd. Minimum 5 ans d'expérience sur route.",
  requirements: ["Permis C", "FIMO", "Carte conducteur", "Expérience route", "Ponctualité", "Autonomie"],
};

export const truckDriverResume = [
  "Chauffeur poids lourd",
  "2012 - 2016 Chauffeur livreur, Messageries du Centre",
  "2016 - 2024 Chauffeur PL, Transports Alpins",
  "Permis B, C, CE",
  "FIMO / FCO à jour",
  "Carte conducteur chronotachygraphe",
  "Expérience route nationale et autoroute",
  "Ponctualité et autonomie reconnues",
].join("\n");

export const dataScientistResume = [
  "Data Scientist at Insight Labs, 2014 - 2024.",
  "Python, machine learning, deep learning, SQL.",
  "Master in statistics.",
].join("\n");
