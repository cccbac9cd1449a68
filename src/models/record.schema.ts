import Joi from "joi";
import {
  FILE_DOWNLOAD_EVENT,
  FILE_UPLOAD_EVENT,
  type SessionRecord,
} from "./record.model";

const fileEventField = Joi.any().when("eventid", {
  is: Joi.valid(FILE_DOWNLOAD_EVENT, FILE_UPLOAD_EVENT),
  then: Joi.string().required(),
});

const shasumField = Joi.any().when("eventid", {
  is: Joi.valid(FILE_DOWNLOAD_EVENT, FILE_UPLOAD_EVENT),
  then: Joi.string().hex().required(),
});

export const sessionRecordSchema = Joi.object<SessionRecord>({
  eventid: Joi.string().required(),
  shasum: shasumField,
  outfile: fileEventField,
}).unknown(true);
