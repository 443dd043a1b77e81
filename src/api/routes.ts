import { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import { Evaluation } from "../model/types.js";
import {
  describeEvaluation,
  evaluateHand,
  isHandError,
  parseHand,
  showdown,
} from "../engine/Showdown.js";

// 手札1つ（"AsKsQsJsTs", "AAAA*" など）。中身の検証はパーサに任せる
const HandSchema = z.string().min(1).max(64);

const EvaluateBody = z.object({ hand: HandSchema });
const CompareBody = z.object({ handA: HandSchema, handB: HandSchema });

function toView(hand: string, e: Evaluation) {
  return {
    hand,
    handType: e.handType,
    rank: e.rank,
    label: describeEvaluation(e),
    wildcardAs: e.wildcardAs,
  };
}

function badRequest(rep: FastifyReply, error: z.ZodError) {
  const message = error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
  return rep.status(400).send({ message });
}

export function registerRoutes(app: FastifyInstance, prefix: string) {
  // ヘルスチェック
  app.get(`${prefix}/health`, async () => ({ ok: true }));

  // 手札1つの役判定
  app.post(`${prefix}/evaluate`, async (req, rep) => {
    const body = EvaluateBody.safeParse(req.body);
    if (!body.success) return badRequest(rep, body.error);

    try {
      const e = evaluateHand(parseHand(body.data.hand));
      req.log.debug({ hand: body.data.hand, handType: e.handType, rank: e.rank }, "evaluated");
      return rep.send(toView(body.data.hand, e));
    } catch (e) {
      if (!isHandError(e)) throw e;
      req.log.info({ hand: e.input, code: e.code }, "rejected hand");
      return rep.status(400).send({ code: e.code, message: e.message });
    }
  });

  // 2つの手札の勝敗
  app.post(`${prefix}/compare`, async (req, rep) => {
    const body = CompareBody.safeParse(req.body);
    if (!body.success) return badRequest(rep, body.error);

    const { handA, handB } = body.data;
    try {
      const result = showdown(handA, handB);
      req.log.debug({ handA, handB, outcome: result.outcome }, "compared");
      const winner =
        result.outcome === "FirstWins" ? handA :
        result.outcome === "SecondWins" ? handB : null;
      return rep.send({
        outcome: result.outcome,
        winner,
        first: toView(handA, result.first),
        second: toView(handB, result.second),
      });
    } catch (e) {
      if (!isHandError(e)) throw e;
      req.log.info({ hand: e.input, code: e.code }, "rejected hand");
      return rep.status(400).send({ code: e.code, message: e.message });
    }
  });
}
