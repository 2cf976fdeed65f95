import { Test, TestingModule } from "@nestjs/testing";
import { DependencyError } from "../../../common/errors/ussd.errors";
import { USSD_CONFIG } from "../../../config/ussd.config";
import { publishingTreeDefinition, testUssdConfig } from "../../../testing/menu-fixtures";
import { MENU_TREE, buildMenuTree } from "../../menu/menu-tree";
import { SessionLockService } from "../../sessions/services/session-lock.service";
import { SessionStoreService } from "../../sessions/services/session-store.service";
import { UssdSession, createFreshSession } from "../../sessions/types/session.types";
import { InputTokenizerService } from "./input-tokenizer.service";
import { ResponseFormatterService } from "./response-formatter.service";
import { SessionStateMachineService } from "./session-state-machine.service";
import { UssdGatewayService } from "./ussd-gateway.service";

describe("UssdGatewayService", () => {
  let service: UssdGatewayService;

  const mockSessionLock = {
    runExclusive: jest.fn(),
  };

  const mockSessionStore = {
    loadOrCreate: jest.fn(),
    save: jest.fn(),
  };

  const mockStateMachine = {
    advance: jest.fn(),
  };

  const existingSession = (): UssdSession => ({
    ...createFreshSession("s1", "254712345678", "category"),
    currentNode: "village",
    collectedFields: { category: "Seeds & Inputs" },
    history: [{ nodeId: "category", field: "category" }],
    lastInput: "1",
    lastDisplay: "Confirm village\n1. Sega\n2. Bumala\n0. Back",
    lastContinue: true,
  });

  beforeEach(async () => {
    jest.clearAllMocks();
    mockSessionLock.runExclusive.mockImplementation(
      (_sessionId: string, _callerId: string, task: () => Promise<string>) => task(),
    );
    mockSessionStore.save.mockResolvedValue(undefined);
    mockStateMachine.advance.mockImplementation(async (session: UssdSession) => ({
      session: { ...session, currentNode: "description" },
      displayText: "Describe Seeds & Inputs\n0. Back",
      continueSession: true,
    }));

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        UssdGatewayService,
        InputTokenizerService,
        ResponseFormatterService,
        { provide: SessionLockService, useValue: mockSessionLock },
        { provide: SessionStoreService, useValue: mockSessionStore },
        { provide: SessionStateMachineService, useValue: mockStateMachine },
        { provide: MENU_TREE, useValue: buildMenuTree(publishingTreeDefinition()) },
        { provide: USSD_CONFIG, useValue: testUssdConfig() },
      ],
    }).compile();

    service = module.get<UssdGatewayService>(UssdGatewayService);
  });

  it("should be defined", () => {
    expect(service).toBeDefined();
  });

  it("should run each callback under the session lock", async () => {
    mockSessionStore.loadOrCreate.mockResolvedValue({
      session: existingSession(),
      expired: false,
      created: false,
    });

    await service.handleCallback({ sessionId: "s1", phoneNumber: "254712345678", text: "1*2" });

    expect(mockSessionLock.runExclusive).toHaveBeenCalledWith(
      "s1",
      "254712345678",
      expect.any(Function),
    );
  });

  it("should feed only the newest step of an existing session to the state machine", async () => {
    const session = existingSession();
    mockSessionStore.loadOrCreate.mockResolvedValue({ session, expired: false, created: false });

    const response = await service.handleCallback({
      sessionId: "s1",
      phoneNumber: "254712345678",
      text: "1*2",
    });

    expect(mockStateMachine.advance).toHaveBeenCalledWith(session, "2", {
      now: expect.any(Date),
      notice: undefined,
    });
    expect(response).toBe("CON Describe Seeds & Inputs\n0. Back");
  });

  it("should save the advanced session with the canonical input key", async () => {
    mockSessionStore.loadOrCreate.mockResolvedValue({
      session: existingSession(),
      expired: false,
      created: false,
    });

    await service.handleCallback({ sessionId: "s1", phoneNumber: "254712345678", text: " 1 * 2 " });

    expect(mockSessionStore.save).toHaveBeenCalledWith(
      expect.objectContaining({ currentNode: "description", lastInput: "1*2" }),
    );
  });

  it("should show the root of a new session whatever the dial string carried", async () => {
    const session = createFreshSession("s2", "254712345678", "category");
    mockSessionStore.loadOrCreate.mockResolvedValue({ session, expired: false, created: true });

    await service.handleCallback({ sessionId: "s2", phoneNumber: "254712345678", text: "1*2" });

    expect(mockStateMachine.advance).toHaveBeenCalledWith(session, null, {
      now: expect.any(Date),
      notice: undefined,
    });
  });

  it("should pass the timeout notice when an expired session restarts", async () => {
    const session = createFreshSession("s1", "254712345678", "category");
    mockSessionStore.loadOrCreate.mockResolvedValue({ session, expired: true, created: true });

    await service.handleCallback({ sessionId: "s1", phoneNumber: "254712345678", text: "1*2*1" });

    expect(mockStateMachine.advance).toHaveBeenCalledWith(session, null, {
      now: expect.any(Date),
      notice: "Session timed out.",
    });
  });

  it("should replay the stored response for a redelivered callback", async () => {
    mockSessionStore.loadOrCreate.mockResolvedValue({
      session: existingSession(),
      expired: false,
      created: false,
    });

    const response = await service.handleCallback({
      sessionId: "s1",
      phoneNumber: "254712345678",
      text: "1",
    });

    expect(response).toBe("CON Confirm village\n1. Sega\n2. Bumala\n0. Back");
    expect(mockStateMachine.advance).not.toHaveBeenCalled();
    expect(mockSessionStore.save).not.toHaveBeenCalled();
  });

  it("should end with the service-unavailable message when the store fails", async () => {
    mockSessionStore.loadOrCreate.mockRejectedValue(
      new DependencyError("session-store.load", "timed out after 2000ms"),
    );

    const response = await service.handleCallback({
      sessionId: "s1",
      phoneNumber: "254712345678",
      text: "1",
    });

    expect(response).toBe("END Try again later.");
    expect(mockSessionStore.save).not.toHaveBeenCalled();
  });

  it("should end with the service-unavailable message when the lock cannot be taken", async () => {
    mockSessionLock.runExclusive.mockRejectedValue(
      new DependencyError("session-lock", "could not acquire ussd:lock:s1:254712345678 within 3000ms"),
    );

    const response = await service.handleCallback({
      sessionId: "s1",
      phoneNumber: "254712345678",
      text: "1",
    });

    expect(response).toBe("END Try again later.");
  });

  it("should end with a generic message on unexpected failures", async () => {
    mockSessionStore.loadOrCreate.mockResolvedValue({
      session: existingSession(),
      expired: false,
      created: false,
    });
    mockStateMachine.advance.mockRejectedValue(new TypeError("boom"));

    const response = await service.handleCallback({
      sessionId: "s1",
      phoneNumber: "254712345678",
      text: "1*2",
    });

    expect(response).toBe("END Something went wrong.");
  });
});
