export {
  createPaperVenue,
  type PaperFill,
  type PaperVenueClient,
  type PaperVenueConfig,
} from "./adapter";
