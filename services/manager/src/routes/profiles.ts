import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import type { ManagerService } from "../core/manager";
import { ProfileNotFoundError } from "../core/errors";
import type { ProfileStore } from "../db/repo";

const FlagSchema = z.union([z.boolean(), z.literal(0), z.literal(1)]).transform((value) => Boolean(value));

const ProfileUpdateSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).optional(),
  autostart: FlagSchema.optional(),
  autoconnect: FlagSchema.optional()
});

const ProfileDriversSchema = z.array(
  z.union([z.object({ label: z.string().min(1) }), z.object({ remote: z.string().min(1) })])
);

const CustomDriverSchema = z.object({
  label: z.string().min(1),
  name: z.string().min(1),
  family: z.string().min(1),
  exec: z.string().min(1),
  version: z.string().min(1).default("1.0")
});

interface ProfileRouteDeps {
  store: ProfileStore;
  manager: ManagerService;
}

type NameRequest = FastifyRequest<{ Params: { name: string } }>;
type NameBodyRequest = FastifyRequest<{ Params: { name: string }; Body: unknown }>;

export function registerProfileRoutes(app: FastifyInstance, deps: ProfileRouteDeps): void {
  const { store, manager } = deps;

  app.get("/api/profiles", () => store.listProfiles());

  // Static segment, matched before `/api/profiles/:name`.
  app.post("/api/profiles/custom", (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    const parsed = CustomDriverSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid custom driver", issues: parsed.error.issues });
    }
    return manager.saveCustomDriver(parsed.data);
  });

  app.get("/api/profiles/:name", (request: NameRequest) => {
    const profile = store.getProfile(request.params.name);
    if (!profile) {
      throw new ProfileNotFoundError(request.params.name);
    }
    return profile;
  });

  app.post("/api/profiles/:name", (request: NameRequest, reply: FastifyReply) => {
    return reply.status(201).send(store.addProfile(request.params.name));
  });

  app.delete("/api/profiles/:name", (request: NameRequest) => {
    if (!store.deleteProfile(request.params.name)) {
      throw new ProfileNotFoundError(request.params.name);
    }
    return { deleted: true };
  });

  app.put("/api/profiles/:name", (request: NameBodyRequest, reply: FastifyReply) => {
    const parsed = ProfileUpdateSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid profile update", issues: parsed.error.issues });
    }
    return store.updateProfile(request.params.name, parsed.data);
  });

  app.post("/api/profiles/:name/drivers", (request: NameBodyRequest, reply: FastifyReply) => {
    const parsed = ProfileDriversSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid profile drivers", issues: parsed.error.issues });
    }
    store.saveProfileDrivers(request.params.name, parsed.data);
    return { saved: parsed.data.length };
  });

  app.get("/api/profiles/:name/labels", (request: NameRequest) => store.getProfileDriverLabels(request.params.name));

  app.get("/api/profiles/:name/remote", (request: NameRequest) => store.getProfileRemoteDrivers(request.params.name) ?? {});
}
